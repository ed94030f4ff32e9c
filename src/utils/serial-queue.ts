import fastq, { queueAsPromised } from "fastq";

type Task = () => Promise<void>;

/**
 * Runs submitted callbacks one at a time, in submission order.
 */
export class SerialQueue {
  private queue: queueAsPromised<Task, void>;

  constructor() {
    this.queue = fastq.promise(this, this.runTask, 1);
  }

  submit<T>(callback: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue
        .push(async () => {
          try {
            resolve(await callback());
          } catch (error: unknown) {
            reject(error);
          }
        })
        .catch(reject);
    });
  }

  get idle(): boolean {
    return this.queue.idle();
  }

  async drained(): Promise<void> {
    if (!this.queue.idle()) {
      await this.queue.drained();
    }
  }

  private async runTask(task: Task): Promise<void> {
    await task();
  }
}
