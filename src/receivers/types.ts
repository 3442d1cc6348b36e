export interface Receiver {
  readonly name: string;
  /** Resolves once the receiver is accepting or pulling data. */
  start(): Promise<void>;
  stop(): Promise<void>;
}
