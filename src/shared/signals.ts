/**
 * Line-level signal detection shared by preprocessing, optimizers and the
 * validation gate.
 */

const FAILURE_PATTERN =
  /\b(error|errors|fail|failed|failure|failures|failing|fatal|panic|panicked|exception|traceback|segfault|abort(ed)?|denied|refused|rejected|unresolved)\b|[✕✗✘×]/i;

// TypeError, IOException and similar class names
const EXCEPTION_NAME_PATTERN = /[a-z](Error|Exception)\b/;

/** True when the line reports an error, failure, crash or rejection. */
export function isFailureLine(line: string): boolean {
  return FAILURE_PATTERN.test(line) || EXCEPTION_NAME_PATTERN.test(line);
}

export function hasFailureSignal(text: string): boolean {
  return text.split("\n").some(isFailureLine);
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf-8");
}
