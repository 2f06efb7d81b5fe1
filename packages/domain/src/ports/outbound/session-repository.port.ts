import type { AnalysisSession } from '../../entities/analysis-session.js';

export interface SessionRepositoryPort {
  put(session: AnalysisSession): void;
  find(id: string): AnalysisSession | null;
  remove(id: string): boolean;
  size(): number;
}
