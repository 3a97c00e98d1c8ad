/**
 * DateEventSequencer: keep progress events in date order
 *
 * Dates may be processed concurrently, but every event of date i reaches
 * the sink before any event of date i+1. The head date (lowest unfinished
 * slot) streams live; later dates buffer until they become the head.
 * All sink calls run on one serialized chain.
 */

type Slot<E> = {
  events: E[];
  finished: boolean;
};

export class DateEventSequencer<E> {
  private readonly slots = new Map<number, Slot<E>>();
  private head = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly sink: (event: E) => Promise<void>) {}

  /**
   * Queue an event for slot `index`
   * Resolves once the sink accepted it (head slot) or it was buffered.
   */
  emit(index: number, event: E): Promise<void> {
    if (index === this.head) {
      this.append(event);
      return this.tail;
    }
    this.slotAt(index).events.push(event);
    return Promise.resolve();
  }

  /**
   * Mark slot `index` complete, releasing any buffered slots behind it
   */
  finish(index: number): Promise<void> {
    this.slotAt(index).finished = true;
    if (index !== this.head) {
      return Promise.resolve();
    }

    while (this.slotAt(this.head).finished) {
      this.slots.delete(this.head);
      this.head++;
      const next = this.slotAt(this.head);
      for (const event of next.events.splice(0)) {
        this.append(event);
      }
    }
    return this.tail;
  }

  /**
   * Settles once every accepted event reached the sink
   */
  drain(): Promise<void> {
    return this.tail;
  }

  private append(event: E): void {
    this.tail = this.tail.then(() => this.sink(event));
  }

  private slotAt(index: number): Slot<E> {
    let slot = this.slots.get(index);
    if (slot === undefined) {
      slot = { events: [], finished: false };
      this.slots.set(index, slot);
    }
    return slot;
  }
}
