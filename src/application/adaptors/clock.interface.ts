export abstract class IClock {
  /** Current time in epoch milliseconds. */
  abstract now(): number;
}
