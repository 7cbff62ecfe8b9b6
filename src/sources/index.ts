import type { DataSource } from '../types/source.js';
import { bo3Source } from './bo3/index.js';

const sources: Map<string, DataSource> = new Map();

function register(source: DataSource): void {
  sources.set(source.sourceType, source);
}

register(bo3Source);

export function getSource(sourceType: string): DataSource {
  const source = sources.get(sourceType);
  if (!source) throw new Error(`Unknown source: ${sourceType}`);
  return source;
}

export function getAllSources(): DataSource[] {
  return Array.from(sources.values());
}
