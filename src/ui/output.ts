import process from "node:process";
import { COLOR_CODES } from "../config/constants.js";
import { colorize } from "./logger.js";

export function separator(debugMode: boolean, label = ""): void {
  if (!debugMode) return;
  const line = "─".repeat(10);
  if (label) {
    console.log(colorize(`${line} ${label} ${line}`, COLOR_CODES.heading));
  } else {
    console.log(colorize(line, COLOR_CODES.heading));
  }
}

/** Command results go to stdout uncolored so they can be piped. */
export function printResult(text: string): void {
  process.stdout.write(`${text}\n`);
}
