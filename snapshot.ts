import { ZERO_READING, type Reading } from "./parser";

/**
 * The latest published reading and when it was published
 */
export interface Snapshot {
  reading: Readonly<Reading>;
  /** Null until the first reading is published */
  updatedAt: Date | null;
}

/**
 * Holds the single most recent Reading
 *
 * The reader loop is the only writer. HTTP handlers read through getLatest().
 * Each publish swaps in a new frozen snapshot, so a reader sees either the
 * old reading or the new one, never a mix of both.
 */
export class ReadingStore {
  private snapshot: Readonly<Snapshot> = Object.freeze({
    reading: ZERO_READING,
    updatedAt: null,
  });

  /**
   * Replaces the current reading
   * @param reading - Fully parsed reading
   * @param at - Publish time, defaults to now
   */
  publish(reading: Reading, at: Date = new Date()): void {
    this.snapshot = Object.freeze({
      reading: Object.freeze({
        angle: reading.angle,
        distance: reading.distance,
        humidity: reading.humidity,
        temperatureC: reading.temperatureC,
        temperatureF: reading.temperatureF,
      }),
      updatedAt: at,
    });
  }

  /**
   * Returns the most recently published reading, or the zero reading
   */
  getLatest(): Readonly<Reading> {
    return this.snapshot.reading;
  }

  getSnapshot(): Readonly<Snapshot> {
    return this.snapshot;
  }
}
