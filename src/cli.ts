#!/usr/bin/env node

import { runCli } from "./services/cli.js";
import { defaultWorkspace } from "./services/commands.js";

process.exitCode = runCli(process.argv.slice(2), defaultWorkspace());
