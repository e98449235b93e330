#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./commandLine";
import { stderrOutput, stdoutOutput } from "./log";

process.exitCode = runCli(hideBin(process.argv), process.env, { stdout: stdoutOutput, stderr: stderrOutput });
