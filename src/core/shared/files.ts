/**
 * File utilities.
 *
 * Existence checks and reads shared by SQL file execution and imports.
 */
import { readFile, stat } from 'node:fs/promises';

/**
 * Error when an input file does not exist.
 *
 * @example
 * ```typescript
 * try {
 *     await client.importCsv('missing.csv', 'users')
 * }
 * catch (err) {
 *     if (err instanceof MissingFileError) console.error(`No such ${err.kind} file: ${err.filepath}`)
 * }
 * ```
 */
export class MissingFileError extends Error {

    override readonly name = 'MissingFileError' as const;

    constructor(
        public readonly kind: string,
        public readonly filepath: string,
    ) {

        super(`${kind} file not found: ${filepath}`);

    }

}

/**
 * Throw MissingFileError unless `filepath` is an existing file.
 *
 * @param kind - Label used in the message (`SQL`, `CSV`, `Parquet`)
 */
export async function assertFileExists(filepath: string, kind: string): Promise<void> {

    const isFile = await stat(filepath).then(
        (stats) => stats.isFile(),
        () => false,
    );

    if (!isFile) {

        throw new MissingFileError(kind, filepath);

    }

}

/**
 * Read a SQL file as UTF-8.
 *
 * @throws MissingFileError if the file does not exist
 */
export async function readSqlFile(filepath: string): Promise<string> {

    await assertFileExists(filepath, 'SQL');

    return readFile(filepath, 'utf-8');

}
