#!/usr/bin/env node

/**
 * TableDB CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
