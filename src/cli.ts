#!/usr/bin/env node
// ABOUTME: Command-line host: replays explorer commands and writes the frame as PNG
// ABOUTME: Stands in for an interactive window loop when running under Node

import { main } from "./cli/main";

process.exitCode = main(process.argv.slice(2));
