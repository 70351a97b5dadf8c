/**
 * Temporary directories for tests that read or write files.
 *
 * @example
 * ```typescript
 * let dir: string
 *
 * beforeEach(async () => {
 *     dir = await makeTestDir()
 * })
 *
 * afterEach(async () => {
 *     await removeTestDir(dir)
 * })
 * ```
 */
import { randomBytes } from 'node:crypto';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

export const TMP_ROOT = join(process.cwd(), 'tmp');

/**
 * Pattern matching test directories (test-[8 hex chars]).
 */
export const TEST_DIR_PATTERN = /^test-[0-9a-f]{8}$/;

export async function makeTestDir(): Promise<string> {

    const dir = join(TMP_ROOT, `test-${randomBytes(4).toString('hex')}`);

    await mkdir(dir, { recursive: true });

    return dir;

}

export async function removeTestDir(dir: string): Promise<void> {

    await rm(dir, { recursive: true, force: true });

}
