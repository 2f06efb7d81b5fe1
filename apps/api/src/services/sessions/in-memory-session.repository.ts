import type { AnalysisSession, SessionRepositoryPort } from '@telemetry-analyzer/domain';

/**
 * Holds each client's loaded dataset and active profile name.
 * Once `maxSessions` is reached the oldest session is evicted.
 */
export class InMemorySessionRepository implements SessionRepositoryPort {
  private readonly sessions = new Map<string, AnalysisSession>();

  constructor(private readonly maxSessions: number = 100) {}

  put(session: AnalysisSession): void {
    if (!this.sessions.has(session.id)) {
      while (this.sessions.size >= this.maxSessions) {
        const oldest = this.sessions.keys().next();
        if (oldest.done) break;
        this.sessions.delete(oldest.value);
        console.log(`[sessions] evicted session ${oldest.value}`);
      }
    }
    this.sessions.set(session.id, session);
  }

  find(id: string): AnalysisSession | null {
    return this.sessions.get(id) ?? null;
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }
}
