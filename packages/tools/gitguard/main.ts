#!/usr/bin/env -S npx tsx
// Entry point for the gitguard executable

import { main } from "./cli.ts";

process.exitCode = await main(process.argv.slice(2));
