/**
 * Copy src/i18n/data into dist so data.ts finds its tables beside the compiled module.
 */

import { cpSync, existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const from = path.join(root, "src", "i18n", "data");
const to = path.join(root, "dist", "src", "i18n", "data");

if (!existsSync(path.join(root, "dist", "src", "i18n", "data.js"))) {
	console.error(`No compiled data module under ${path.dirname(to)}; run tsc first.`);
	process.exit(1);
}

cpSync(from, to, { recursive: true, filter: (source) => !source.endsWith(".ts") });
console.log(`data files: ${path.relative(root, from)} -> ${path.relative(root, to)}`);
