/**
 * Metrics tracking for feed decoding, per document type
 */

import type { OperationKind } from "../types.js";

export interface DocumentTypeMetrics {
  puts: number;
  updates: number;
  removes: number;
  /** Field values and field updates decoded */
  fields: number;
  decodeTimeMs: number[];
  /** Failures by error code */
  errors: Record<string, number>;
}

// Samples kept per document type
const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, DocumentTypeMetrics>();

  /**
   * Get or create metrics for a document type
   */
  #getMetrics(type: string): DocumentTypeMetrics {
    let metrics = this.#metrics.get(type);
    if (!metrics) {
      metrics = {
        puts: 0,
        updates: 0,
        removes: 0,
        fields: 0,
        decodeTimeMs: [],
        errors: {},
      };
      this.#metrics.set(type, metrics);
    }
    return metrics;
  }

  /**
   * Record a decoded operation
   */
  recordOperation(type: string, kind: OperationKind, fields: number, ms: number): void {
    const metrics = this.#getMetrics(type);
    switch (kind) {
      case "put":
        metrics.puts++;
        break;
      case "update":
        metrics.updates++;
        break;
      case "remove":
        metrics.removes++;
        break;
    }
    metrics.fields += fields;
    metrics.decodeTimeMs.push(ms);

    if (metrics.decodeTimeMs.length > MAX_SAMPLES) {
      metrics.decodeTimeMs.shift();
    }
  }

  /**
   * Record a decode failure
   * @param type - Document type, or "(unknown)" when it was never resolved
   */
  recordError(type: string, code: string): void {
    const metrics = this.#getMetrics(type);
    metrics.errors[code] = (metrics.errors[code] ?? 0) + 1;
  }

  /**
   * Get metrics for a document type
   */
  getMetrics(type: string): DocumentTypeMetrics | undefined {
    return this.#metrics.get(type);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, DocumentTypeMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Operations decoded for a document type
   */
  getOperationCount(type: string): number {
    const metrics = this.#metrics.get(type);
    return metrics ? metrics.puts + metrics.updates + metrics.removes : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 decode time
   */
  getP95DecodeTime(type: string): number {
    return this.getP95(this.#metrics.get(type)?.decodeTimeMs ?? []);
  }

  /**
   * Reset metrics for a document type, or all of them
   */
  reset(type?: string): void {
    if (type) {
      this.#metrics.delete(type);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
