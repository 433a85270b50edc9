import { RunMetrics } from '../types';

const emptyMetrics = (): RunMetrics => ({
  requests: 0,
  cacheHits: 0,
  cacheMisses: 0,
  fetchErrors: 0,
  skippedSpecies: 0,
  skippedChains: 0,
  excludedForms: 0,
});

export class Metrics {
  private metrics: RunMetrics = emptyMetrics();

  public increment(type: keyof RunMetrics, by = 1) {
    this.metrics[type] += by;
  }

  public getMetrics(): RunMetrics {
    return { ...this.metrics };
  }

  public reset() {
    this.metrics = emptyMetrics();
  }
}

export const metrics = new Metrics();
