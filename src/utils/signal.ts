import Debug from "debug";

const debug = Debug("client");

/**
 * Resolves with the first of the signals the process receives.
 */
export const waitForSignal = (
  signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
): Promise<NodeJS.Signals> =>
  new Promise<NodeJS.Signals>((resolve) => {
    const listener = (received: NodeJS.Signals) => {
      debug("received %s", received);
      for (const signal of signals) {
        process.off(signal, listener);
      }
      resolve(received);
    };
    for (const signal of signals) {
      process.once(signal, listener);
    }
  });
