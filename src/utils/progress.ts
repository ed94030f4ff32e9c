import { format } from "bytes";
import ms from "ms";

const activityIndicators = "⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏";

/**
 * Progress line for the terminal, redrawn in place on stderr.
 */
export class Progress {
  private bytes = 0;
  private total = 0;
  private start: number | undefined = undefined;
  private status = "";

  private activityIndicatorIndex = 0;
  private stream: NodeJS.WriteStream;

  constructor(stream: NodeJS.WriteStream = process.stderr) {
    this.stream = stream;
  }

  terminate(): void {
    this.stream.write("\n");
  }

  setTotal(total: number): void {
    this.total = total;
    this.start ??= Date.now();
    this.update();
  }

  setStatus(status: string): void {
    this.status = status;
    this.update();
  }

  complete(bytes: number): void {
    this.bytes += bytes;
    this.pulse();
  }

  pulse(): void {
    this.activityIndicatorIndex =
      (this.activityIndicatorIndex + 1) % activityIndicators.length;
    this.update();
  }

  line(): string {
    const { bytes, start, total } = this;
    const percent = total === 0 ? 0 : Math.round((bytes / total) * 100);
    const parts = [`${percent}%`, `${format(bytes)} / ${format(total)}`];
    if (start !== undefined) {
      parts.push(ms(Date.now() - start));
    }
    if (this.status !== "") {
      parts.push(this.status);
    }
    return `${activityIndicators[this.activityIndicatorIndex]} ${parts.join(" ")}`;
  }

  private update(): void {
    const { stream } = this;
    if (stream.isTTY) {
      stream.cursorTo(0);
      stream.clearLine(1);
    } else {
      stream.write("\r");
    }
    stream.write(this.line());
  }
}
