#!/usr/bin/env node
import { runExtractCli } from "./cli.js";

process.exitCode = await runExtractCli(process.argv.slice(2));
