/**
 * Conversation Enricher
 *
 * Background summarization off the request path. Jobs go through a
 * bounded queue served by a fixed number of workers; when the queue is
 * full new jobs are dropped. Results land in the memory store as the
 * conversation's cached summary.
 */

import pLimit from 'p-limit';
import type { ConversationMemoryService } from '@/core/memory/service';
import { logError, logWarning } from '@/utils/logger';
import type { ConversationSummarizer } from './summarizer';
import type { EnricherStats, EnrichmentJob } from './types';

export interface EnricherOptions {
  workers: number;
  queueSize: number;
}

export class ConversationEnricher {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<Promise<void>>();
  /** Conversations with a job queued or running */
  private readonly scheduled = new Set<string>();
  private completed = 0;
  private failed = 0;
  private dropped = 0;

  constructor(
    private readonly summarizer: ConversationSummarizer,
    private readonly memoryService: ConversationMemoryService,
    private readonly options: EnricherOptions
  ) {
    this.limit = pLimit(options.workers);
  }

  /**
   * Queue a summarization job.
   *
   * @returns false when the job was dropped (queue full, or the
   * conversation already has one pending)
   */
  enqueue(job: EnrichmentJob): boolean {
    if (this.scheduled.has(job.conversationId)) {
      this.dropped++;
      return false;
    }
    if (this.limit.pendingCount >= this.options.queueSize) {
      this.dropped++;
      logWarning(`Enrichment queue full, dropping job for ${job.conversationId}`);
      return false;
    }

    this.scheduled.add(job.conversationId);
    const task = this.limit(() => this.run(job)).finally(() => {
      this.scheduled.delete(job.conversationId);
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
    return true;
  }

  isPending(conversationId: string): boolean {
    return this.scheduled.has(conversationId);
  }

  /**
   * Resolve once every queued and running job has finished.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  stats(): EnricherStats {
    return {
      workers: this.options.workers,
      queueSize: this.options.queueSize,
      active: this.limit.activeCount,
      pending: this.limit.pendingCount,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped
    };
  }

  private async run(job: EnrichmentJob): Promise<void> {
    try {
      const memory = await this.memoryService.getConversationMemory(job.conversationId);
      const summary = await this.summarizer.generateSummary(job.query, job.history, memory);
      const stored = await this.memoryService.storeConversationSummary(job.conversationId, summary);
      if (stored) this.completed++;
      else this.failed++;
    } catch (error) {
      this.failed++;
      logError(`Enrichment failed for ${job.conversationId}`, error);
    }
  }
}
