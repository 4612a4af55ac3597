import pLimit from "p-limit";

export type AdmissionController = {
  readonly capacity: number;
  active(): number;
  pending(): number;
  run<T>(task: () => Promise<T>): Promise<T>;
  acquire(): Promise<() => void>;
  guard<T>(source: () => AsyncGenerator<T>): AsyncGenerator<T>;
};

// Excess callers queue for a permit; nothing is rejected.
export function createAdmissionController(capacity: number): AdmissionController {
  const limit = pLimit(Math.max(1, Math.floor(capacity)));

  function acquire(): Promise<() => void> {
    return new Promise((granted) => {
      void limit(
        () =>
          new Promise<void>((release) => {
            let released = false;
            granted(() => {
              if (!released) {
                released = true;
                release();
              }
            });
          }),
      );
    });
  }

  return {
    capacity: Math.max(1, Math.floor(capacity)),

    active() {
      return limit.activeCount;
    },

    pending() {
      return limit.pendingCount;
    },

    run(task) {
      return limit(task);
    },

    acquire,

    // The permit is taken on the first pull and held until the generator finishes or is returned.
    async *guard(source) {
      const release = await acquire();
      try {
        yield* source();
      } finally {
        release();
      }
    },
  };
}
