#!/usr/bin/env node
import "dotenv/config";
import { buildProgram } from "./cli/commands.js";

const program = buildProgram();
await program.parseAsync(process.argv);
