#!/usr/bin/env node
import { runNotifyCli } from "./cli.js";

process.exitCode = await runNotifyCli(process.argv.slice(2));
