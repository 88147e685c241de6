export type DetectionStats = {
  total: number;
  scam: number;
  safe: number;
  rateLimited: number;
  escalations: number;
};

export class StatsCounter {
  private stats: DetectionStats = { total: 0, scam: 0, safe: 0, rateLimited: 0, escalations: 0 };

  recordVerdict(isScam: boolean): void {
    this.stats.total += 1;
    if (isScam) this.stats.scam += 1;
    else this.stats.safe += 1;
  }

  recordRateLimited(): void {
    this.stats.rateLimited += 1;
  }

  recordEscalation(): void {
    this.stats.escalations += 1;
  }

  snapshot(): DetectionStats {
    return { ...this.stats };
  }
}
