import { v4 as uuidv4 } from 'uuid';
import { Candidate, Vote, VoteCategory } from '../src/types';

export const CAST_AT = new Date('2026-01-14T12:00:00Z');

export function createTestCandidates(count: number, overrides: Partial<Candidate> = {}): Candidate[] {
  return Array.from({ length: count }, (_, i): Candidate => ({
    id: uuidv4(),
    title: `Test Recipe ${i}`,
    difficulty: 'medium',
    ...overrides,
  }));
}

export function createTestVoters(count: number): string[] {
  return Array.from({ length: count }, () => uuidv4());
}

export function createVote(
  category: VoteCategory,
  candidate: Candidate,
  voterId: string,
  castAt: Date = CAST_AT
): Vote {
  return { voterId, candidateId: candidate.id, category, castAt };
}
