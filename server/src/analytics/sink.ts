import fs from 'fs/promises';
import path from 'path';
import type { CoordinatorMetrics, ShutdownReason } from '../coordinator/coordinator.js';

export type SessionMetricsEntry = {
  sessionId: string;
  started_at: number | null;
  duration_ms: number;
  reason: ShutdownReason | null;
  dropped_facts: number;
  metrics: CoordinatorMetrics;
};

// One JSON line per finished session.
export async function writeSessionMetrics(entry: SessionMetricsEntry, outputPath: string): Promise<string> {
  const resolvedPath = path.resolve(outputPath);
  await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
  const line = JSON.stringify({ ...entry, recorded_at: new Date().toISOString() });
  await fs.appendFile(resolvedPath, `${line}\n`, 'utf8');
  return resolvedPath;
}
