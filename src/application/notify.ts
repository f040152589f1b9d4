/**
 * Run an event publication after a change has been stored. The change is
 * already committed, so a failing publication is logged and never rethrown.
 */
export function notifyCommitted(eventType: string, publish: () => void): void {
  try {
    publish();
  } catch (error) {
    console.warn(`Failed to publish ${eventType} event:`, error);
  }
}
