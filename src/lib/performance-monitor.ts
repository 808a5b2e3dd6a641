/**
 * Timing of one evaluated chunk of the iteration field.
 */
export interface ChunkMetrics {
  chunkIndex: number;
  computeTime: number; // milliseconds
}

/**
 * Metrics for a complete recompute pass.
 */
export interface RenderSessionMetrics {
  sessionId: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalChunks: number;
  completedChunks: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averageChunkTime: number;
}

interface RenderSession {
  sessionId: string;
  startTime: number;
  totalChunks: number;
  chunkMetrics: ChunkMetrics[];
  totalPixels: number;
}

/**
 * Performance monitor for iteration field recomputes.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRender(chunks.length, width * height);
 *
 * // For each chunk completion:
 * monitor.recordChunk(sessionId, chunkIndex, computeTime);
 *
 * const metrics = monitor.endRender(sessionId);
 * console.log(`Recompute took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RenderSession>();
  private completedSessions: RenderSessionMetrics[] = [];
  private totalRenders = 0;
  private sequence = 0;

  constructor(private maxHistorySize = 50) {}

  /**
   * Starts a new recompute session.
   *
   * @returns Session ID for tracking
   */
  startRender(totalChunks: number, totalPixels: number): string {
    const sessionId = `render-${++this.sequence}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      startTime: performance.now(),
      totalChunks,
      chunkMetrics: [],
      totalPixels,
    });

    return sessionId;
  }

  recordChunk(sessionId: string, chunkIndex: number, computeTime: number): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown session ${sessionId}`);
      return;
    }

    session.chunkMetrics.push({ chunkIndex, computeTime });
  }

  /**
   * Ends a session and calculates its final metrics.
   */
  endRender(sessionId: string): RenderSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = performance.now();
    const duration = endTime - session.startTime;
    const completedChunks = session.chunkMetrics.length;

    const averageChunkTime =
      completedChunks > 0 ? session.chunkMetrics.reduce((sum, m) => sum + m.computeTime, 0) / completedChunks : 0;

    const metrics: RenderSessionMetrics = {
      sessionId,
      startTime: session.startTime,
      endTime,
      duration,
      totalChunks: session.totalChunks,
      completedChunks,
      totalPixels: session.totalPixels,
      pixelsPerSecond: duration > 0 ? (session.totalPixels / duration) * 1000 : 0,
      averageChunkTime,
    };

    this.totalRenders++;
    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(sessionId);

    return metrics;
  }

  /**
   * Progress of an active session as a percentage, or null if the session is unknown.
   */
  getProgress(sessionId: string): number | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return null;
    }

    return session.totalChunks > 0 ? (session.chunkMetrics.length / session.totalChunks) * 100 : 0;
  }

  getLastRenderMetrics(): RenderSessionMetrics | null {
    if (this.completedSessions.length === 0) {
      return null;
    }
    return this.completedSessions[this.completedSessions.length - 1];
  }

  /**
   * Summary across every completed session. Averages cover the retained history only.
   */
  getStats(): { totalRenders: number; averageDuration: number; averagePixelsPerSecond: number } {
    const retained = this.completedSessions.length;
    if (retained === 0) {
      return { totalRenders: this.totalRenders, averageDuration: 0, averagePixelsPerSecond: 0 };
    }

    const totalDuration = this.completedSessions.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = this.completedSessions.reduce((sum, m) => sum + m.pixelsPerSecond, 0);

    return {
      totalRenders: this.totalRenders,
      averageDuration: totalDuration / retained,
      averagePixelsPerSecond: totalPixelsPerSecond / retained,
    };
  }

  getHistory(): RenderSessionMetrics[] {
    return [...this.completedSessions];
  }
}
