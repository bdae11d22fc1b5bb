#!/usr/bin/env node
import { isDirectRun } from "./src/cli/entry.js";
import { main } from "./src/index.js";

export { main };

// Runs as `node dist/index.js` and through the npm bin symlink
if (isDirectRun(process.argv[1], import.meta.url)) {
  void main(process.argv);
}
