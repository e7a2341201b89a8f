/**
 * InsiderScoringService
 *
 * Scores event titles with an LLM for how plausibly insiders trade on them.
 * - One chat completion per title; the reply's `Score: N` line is the score
 * - A reply without a parsable score is re-requested, then scored 0
 * - Batches run on a bounded worker pool; a failing title scores 0
 */

import type { OpenRouterClient } from '../clients/openrouter.js';
import type { EventScores } from '../core/data-store.js';
import type { EventSummary } from '../core/types.js';
import { runBounded } from '../core/worker-pool.js';
import { INSIDER_SCORE_SYSTEM_PROMPT, getInsiderScoreUserPrompt } from './prompts.js';

// ===== Types =====

export interface InsiderScoringConfig {
  model: string;
  /** Titles scored at once (default: 8) */
  concurrency?: number;
  /** Requests per title before falling back to 0 (default: 3) */
  maxAttempts?: number;
  maxTokens?: number;
  temperature?: number;
}

export interface ScoringCandidate {
  id: string;
  title: string;
}

/** Events with a known volume below this are not scored */
export const DEFAULT_VOLUME_THRESHOLD = 25_000;

const SCORE_LINE = /^score:\s*([+-]?\d+)\s*$/;

/**
 * Score from the first `Score: N` line of a reply (case-insensitive), or null.
 */
export function parseScore(reply: string): number | null {
  for (const line of reply.trim().toLowerCase().split(/\r?\n/)) {
    const match = SCORE_LINE.exec(line.trim());
    if (match) return Number.parseInt(match[1], 10);
  }
  return null;
}

/**
 * Events worth scoring: titled, not yet scored, and not known to trade
 * below `volumeThreshold`.
 */
export function selectEventsForScoring(
  events: readonly EventSummary[],
  existing: EventScores,
  volumeThreshold: number = DEFAULT_VOLUME_THRESHOLD
): ScoringCandidate[] {
  const candidates: ScoringCandidate[] = [];
  for (const event of events) {
    if (event.volume !== null && event.volume < volumeThreshold) continue;
    if (Object.hasOwn(existing, event.id)) continue;
    if (!event.title) continue;
    candidates.push({ id: event.id, title: event.title });
  }
  return candidates;
}

/**
 * Existing scores with the new ones laid over them
 */
export function mergeScores(
  existing: EventScores,
  candidates: readonly ScoringCandidate[],
  scores: readonly number[]
): EventScores {
  const merged: EventScores = { ...existing };
  candidates.forEach((candidate, idx) => {
    merged[candidate.id] = scores[idx] ?? 0;
  });
  return merged;
}

// ===== Service =====

export class InsiderScoringService {
  private config: Required<InsiderScoringConfig>;

  constructor(
    private client: OpenRouterClient,
    config: InsiderScoringConfig
  ) {
    this.config = {
      model: config.model,
      concurrency: config.concurrency ?? 8,
      maxAttempts: config.maxAttempts ?? 3,
      maxTokens: config.maxTokens ?? 1024,
      temperature: config.temperature ?? 0.5,
    };
  }

  /**
   * Score one title. Transport errors propagate.
   */
  async scoreEvent(title: string): Promise<number> {
    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const reply = await this.client.chatCompletion({
        model: this.config.model,
        messages: [
          { role: 'system', content: INSIDER_SCORE_SYSTEM_PROMPT },
          { role: 'user', content: getInsiderScoreUserPrompt(title) },
        ],
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });
      const score = parseScore(reply);
      if (score !== null) return score;
    }

    console.warn(`[InsiderScoringService] No score after ${this.config.maxAttempts} attempts for "${title}"`);
    return 0;
  }

  /**
   * Scores aligned with `titles`.
   */
  async scoreEvents(titles: readonly string[]): Promise<number[]> {
    return runBounded(titles, (title) => this.scoreEvent(title), {
      concurrency: this.config.concurrency,
      fallback: 0,
      onError: (error, title) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[InsiderScoringService] Scoring failed for "${title}": ${message}`);
      },
    });
  }

  /**
   * Score every selected event and merge the results into `existing`.
   */
  async scoreNewEvents(
    events: readonly EventSummary[],
    existing: EventScores,
    volumeThreshold: number = DEFAULT_VOLUME_THRESHOLD
  ): Promise<{ scored: number; scores: EventScores }> {
    const candidates = selectEventsForScoring(events, existing, volumeThreshold);
    const scores = await this.scoreEvents(candidates.map((candidate) => candidate.title));
    return { scored: candidates.length, scores: mergeScores(existing, candidates, scores) };
  }
}
