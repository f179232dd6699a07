import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Run `fn` and return what it throws.
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}

/**
 * A fresh directory under the OS temp dir.
 */
export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'quarrydb-test-'));
}
