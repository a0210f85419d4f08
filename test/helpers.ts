/**
 * Runs action and returns what it threw, so tests can assert on error codes and details.
 */
export function CaptureError(action: () => unknown): unknown {
    try {
        action();
    } catch(err) {
        return err;
    }
    throw new Error('expected the action to throw');
}
