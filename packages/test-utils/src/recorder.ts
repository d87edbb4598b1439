/**
 * Collects everything handed to a subscriber, for assertions.
 */
export interface Recorder<E> {
  readonly events: readonly E[];
  readonly handler: (event: E) => void;
  clear(): void;
}

export function createRecorder<E>(): Recorder<E> {
  const events: E[] = [];
  return {
    events,
    handler: (event) => {
      events.push(event);
    },
    clear: () => {
      events.length = 0;
    },
  };
}
