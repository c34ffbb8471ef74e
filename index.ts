#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { buildProgram, main } from "./src/index.js";

export { buildProgram, main };

// npm links the bin, so compare against the resolved script path.
const entry = process.argv[1] ? pathToFileURL(fs.realpathSync(process.argv[1])).href : "";
if (import.meta.url === entry) {
  void main(process.argv);
}
