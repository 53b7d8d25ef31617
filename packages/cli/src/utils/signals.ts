import { Logger } from './cli-helpers.js';

const SIGNAL_NUMBERS = { SIGINT: 2, SIGTERM: 15 } as const;

export type ShutdownSignal = keyof typeof SIGNAL_NUMBERS;

/** Shell convention: 128 plus the signal number. */
export function exitCodeForSignal(signal: ShutdownSignal): number {
  return 128 + SIGNAL_NUMBERS[signal];
}

/** Aborted on shutdown so running renders stop their d2 process. */
export const shutdown = new AbortController();

export function handleShutdown(signal: ShutdownSignal, controller = shutdown): never {
  Logger.warn(`Received ${signal}, shutting down...`);
  controller.abort(new Error(`Received ${signal}`));
  process.exit(exitCodeForSignal(signal));
}

export function setupSignalHandlers(): void {
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}
