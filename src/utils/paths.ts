/**
 * Locates the project root, so `.env` and `logs/` resolve to the same place
 * whether the code runs from `src/` or from the compiled `dist/src/`.
 *
 * @module utils/paths
 */

import * as fs from "fs";
import * as path from "path";

/**
 * Walks up from `start` to the nearest directory holding a package.json.
 * Falls back to the working directory when there is none.
 */
export function findProjectRoot(start: string = __dirname): string {
	let dir = path.resolve(start);
	for (;;) {
		if (fs.existsSync(path.join(dir, "package.json"))) {
			return dir;
		}
		const parent = path.dirname(dir);
		if (parent === dir) {
			return process.cwd();
		}
		dir = parent;
	}
}

export const PROJECT_ROOT = findProjectRoot();

/** `.env` read at startup */
export const ENV_FILE = path.join(PROJECT_ROOT, ".env");

/** Directory for the winston file transports */
export const LOG_DIR = path.join(PROJECT_ROOT, "logs");
