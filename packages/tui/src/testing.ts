/**
 * Test utilities for @replkit/tui.
 *
 * A keystroke written to ink-testing-library's stdin reaches the REPL
 * synchronously, but the runner settles on a microtask and the new view is
 * committed by React afterwards. `flush()` waits for both: a `setTimeout(0)`
 * drains microtasks, and the `setImmediate` after it runs once React's
 * scheduler has flushed passive effects such as `useInput` subscriptions.
 */

/** Flush pending React renders and effects. */
export const flush = () => new Promise<void>((r) => setTimeout(() => setImmediate(r), 0));

/**
 * Poll until an assertion passes, flushing between attempts. Rethrows the
 * last failure after `timeout` ms.
 */
export async function waitFor(assertion: () => void, timeout = 2000): Promise<void> {
  const start = Date.now();
  let lastError: unknown;
  while (Date.now() - start < timeout) {
    await flush();
    try {
      assertion();
      return;
    } catch (e) {
      lastError = e;
    }
  }
  throw lastError;
}

/** Write `text` one character at a time, flushing after each. */
export async function typeInto(stdin: { write: (data: string) => void }, text: string): Promise<void> {
  for (const char of text) {
    stdin.write(char);
    await flush();
  }
}
