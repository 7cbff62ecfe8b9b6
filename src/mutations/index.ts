import type { SourceMutation } from '../types/source.js';
import { Bo3Mutation } from './bo3.js';

const mutations: Map<string, SourceMutation> = new Map();

function register(mutation: SourceMutation): void {
  mutations.set(mutation.sourceType, mutation);
}

register(new Bo3Mutation());

export function getMutation(sourceType: string): SourceMutation {
  const mutation = mutations.get(sourceType);
  if (!mutation) throw new Error(`Unknown source type: ${sourceType}`);
  return mutation;
}

export { Bo3Mutation, impliedProbability } from './bo3.js';
