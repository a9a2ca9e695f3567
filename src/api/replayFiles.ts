import { ReplayReadError } from '../types/errors';

/** The part of a browser `File` the reader needs. */
export interface ReplaySource {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type ReadReplayFile = (file: ReplaySource, signal?: AbortSignal) => Promise<Uint8Array>;

function abortError(name: string): Error {
  const err = new Error(`Read of ${name} was cancelled`);
  err.name = 'AbortError';
  return err;
}

/**
 * Read an uploaded replay into memory. Rejects with an `AbortError` as soon
 * as `signal` aborts and with a ReplayReadError when the bytes cannot be read.
 */
export const readReplayFile: ReadReplayFile = (file, signal) => {
  if (signal?.aborted) return Promise.reject(abortError(file.name));

  return new Promise<Uint8Array>((resolve, reject) => {
    const onAbort = () => reject(abortError(file.name));
    signal?.addEventListener('abort', onAbort, { once: true });

    file.arrayBuffer().then(
      (buffer) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(new Uint8Array(buffer));
      },
      (err: unknown) => {
        signal?.removeEventListener('abort', onAbort);
        const message = err instanceof Error ? err.message : String(err);
        reject(new ReplayReadError(file.name, `Unable to read ${file.name}: ${message}`));
      },
    );
  });
};
