/**
 * LiveConsoleOutput — real terminal output, coloured with picocolors.
 * Warnings and errors go to stderr so stdout stays clean for `command`.
 */

import pc from "picocolors";
import type { ConsoleOutput } from "./console.js";

function emit(stream: NodeJS.WriteStream, text: string, newline: boolean): void {
  stream.write(newline ? text + "\n" : text);
}

export class LiveConsoleOutput implements ConsoleOutput {
  write(text: string, newline = true): void {
    emit(process.stdout, text, newline);
  }

  error(text: string, newline = true): void {
    emit(process.stderr, pc.red(text), newline);
  }

  success(text: string, newline = true): void {
    emit(process.stdout, pc.green(text), newline);
  }

  warn(text: string, newline = true): void {
    emit(process.stderr, pc.yellow(text), newline);
  }

  info(text: string, newline = true): void {
    emit(process.stdout, pc.dim(text), newline);
  }

  step(text: string, newline = true): void {
    emit(process.stdout, pc.cyan(text), newline);
  }
}
