/**
 * UI Utilities
 *
 * Program output (passwords, listings) goes to stdout unstyled;
 * status and diagnostics go to stderr.
 *
 * @example
 * ```typescript
 * import { UI } from "./ui.js";
 *
 * UI.output("Kp4x_Tm9n_Bc2w_Qf7v");
 * UI.success("Copied to clipboard");
 * ```
 */

import { EOL } from "os";
import { Message } from "./style.js";

export namespace UI {
  /** Write a line of program output to stdout */
  export function output(...message: string[]) {
    process.stdout.write(message.join(" ") + EOL);
  }

  /** Print message to stderr with newline */
  export function println(...message: string[]) {
    print(...message);
    process.stderr.write(EOL);
  }

  /** Print message to stderr without newline */
  export function print(...message: string[]) {
    process.stderr.write(message.join(" "));
  }

  export function warn(text: string) {
    println(Message.warning(text));
  }

  export function success(text: string) {
    println(Message.success(text));
  }

  export function error(message: string) {
    println(Message.error(message));
  }
}
