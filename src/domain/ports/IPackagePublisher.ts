/**
 * Result of a successful publish
 */
export interface PublishResult {
  /** Absolute path of the written document */
  path: string;
  bytes: number;
}

/**
 * Port for persisting the generated package document.
 * Implementations replace the destination atomically and throw
 * PersistenceError on failure, leaving the previous document untouched.
 */
export interface IPackagePublisher {
  publish(document: string): Promise<PublishResult>;
}
