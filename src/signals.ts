/**
 * Shared interruption flag, set by the CLI's SIGINT handler and polled by the
 * scheduler and long-running remote jobs.
 */

let interrupted = false;

export function setInterrupted(value: boolean): void {
  interrupted = value;
}

export function isInterrupted(): boolean {
  return interrupted;
}
