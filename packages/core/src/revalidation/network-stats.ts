/**
 * Network statistics
 *
 * Counters for traffic to the origin, kept by the revalidation
 * orchestrator.
 */

/**
 * Snapshot of the network counters
 */
export interface NetworkStatisticsSnapshot {
  /** Fresh responses received */
  downloads: number;
  /** Bytes received in fresh responses */
  bytesDownloaded: number;
  /** Cached payload bytes confirmed by "not modified" answers */
  bytesSaved: number;
  /** Requests sent with a validator */
  conditionalRequests: number;
  /** "Not modified" answers */
  notModified: number;
  /** Failed fetches */
  failures: number;
}

export class NetworkStatistics {
  private counters: NetworkStatisticsSnapshot = NetworkStatistics.empty();

  private static empty(): NetworkStatisticsSnapshot {
    return {
      downloads: 0,
      bytesDownloaded: 0,
      bytesSaved: 0,
      conditionalRequests: 0,
      notModified: 0,
      failures: 0,
    };
  }

  recordConditionalRequest(): void {
    this.counters.conditionalRequests++;
  }

  recordDownload(byteLength: number): void {
    this.counters.downloads++;
    this.counters.bytesDownloaded += byteLength;
  }

  recordNotModified(savedBytes: number): void {
    this.counters.notModified++;
    this.counters.bytesSaved += savedBytes;
  }

  recordFailure(): void {
    this.counters.failures++;
  }

  /**
   * notModified / conditionalRequests, or 0 when no conditional request was sent
   */
  validatorHitRate(): number {
    const { conditionalRequests, notModified } = this.counters;
    return conditionalRequests > 0 ? notModified / conditionalRequests : 0;
  }

  snapshot(): NetworkStatisticsSnapshot {
    return { ...this.counters };
  }

  reset(): void {
    this.counters = NetworkStatistics.empty();
  }
}
