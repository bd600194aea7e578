import { writeFileSync, renameSync, rmSync } from 'fs';
import { basename, dirname, join } from 'path';

export class ReportWriteError extends Error {
  readonly kind = 'sink-write-failure';

  constructor(readonly path: string, cause: unknown) {
    super(`Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ReportWriteError';
  }
}

/**
 * Write `content` to `path` through a temporary sibling and a rename, so a
 * failed write leaves any earlier file at `path` as it was.
 */
export function writeReportFile(path: string, content: string): void {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);

  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, path);
  } catch (err) {
    try {
      rmSync(tempPath, { force: true });
    } catch (cleanupErr) {
      console.error(`[Report] Could not remove ${tempPath}:`, cleanupErr instanceof Error ? cleanupErr.message : cleanupErr);
    }
    throw new ReportWriteError(path, err);
  }

  console.error(`[Report] Written: ${path}`);
}
