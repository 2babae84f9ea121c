import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  retries?: number;
  staleMs?: number;
}

/**
 * Holds `<filePath>.lock` while fn runs so the gateway and CLI commands
 * never interleave writes to the same settings file.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries ?? 5, minTimeout: 50 },
      stale: options.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
