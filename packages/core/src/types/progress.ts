/**
 * Progress sink boundary
 *
 * Implemented by the front end. The core only promises complete, well-formed
 * calls; marshalling onto a UI thread is the implementer's job.
 */

export interface ProgressSink {
  writeInfo(channel: number, text: string): void;
  writeError(channel: number, text: string): void;
  writeCommand(channel: number, text: string): void;
  updateProgress(label: string, done: number, total: number): void;
}

export const nullSink: ProgressSink = {
  writeInfo: () => undefined,
  writeError: () => undefined,
  writeCommand: () => undefined,
  updateProgress: () => undefined,
};
