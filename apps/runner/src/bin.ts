#!/usr/bin/env node

/**
 * Runner entry point, started by `npm run demo -- <tokens...>`.
 *
 *   npm run demo -- add 2 3
 *   npm run demo -- greet Ada -g Hi --times 2
 *   npm run demo -- math div 1 4
 *   npm run demo -- --help
 */

import { main } from "./app.js";

main(process.argv.slice(2));
