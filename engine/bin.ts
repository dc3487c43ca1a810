#!/usr/bin/env node
// engine/bin.ts — Executable entry point

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
