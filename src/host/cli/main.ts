#!/usr/bin/env -S npx tsx
import { runCli } from './run';

process.exitCode = runCli(process.argv.slice(2));
