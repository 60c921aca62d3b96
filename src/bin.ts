#!/usr/bin/env node
import { createProgram } from "./cli.js";

createProgram().parseAsync(process.argv).catch((e) => {
  console.error("sealcheck: fatal", e);
  process.exit(1);
});
