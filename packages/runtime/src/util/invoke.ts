// Run every callback even when some of them throw

/**
 * Invoke all callbacks in order. Errors are collected and thrown together as
 * one AggregateError once every callback had its turn.
 */
export async function tryInvokeAll(
  callbacks: Iterable<() => void | Promise<void>>,
  message = 'Some callbacks threw an exception'
): Promise<void> {
  const errors: unknown[] = [];

  for (const callback of callbacks) {
    try {
      await callback();
    } catch (error) {
      errors.push(error);
    }
  }

  if (errors.length > 0) {
    throw new AggregateError(errors, message);
  }
}
