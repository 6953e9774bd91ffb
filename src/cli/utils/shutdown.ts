// Waiting for the operator to stop a long-running command

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Resolves with the first termination signal received
 */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      for (const name of SIGNALS) {
        process.off(name, onSignal);
      }
      resolve(signal);
    };
    for (const name of SIGNALS) {
      process.on(name, onSignal);
    }
  });
}
