import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { INVOICE_PROFILE } from '../config/invoice-profile';
import { ConversationPhase, InvoiceProfile } from '../types/invoice.types';

export interface DraftSession {
  draft: InvoiceDraft;
  phase: ConversationPhase;
  history: string[];
}

export function createEmptyDraft(defaultTaxPercent: number): InvoiceDraft {
  return {
    currency: 'INR',
    taxPercent: defaultTaxPercent,
    shippingFee: 0,
    discount: 0,
    items: [],
  };
}

/**
 * In-memory drafts keyed by session id.
 *
 * Sessions are created on first access and removed on finalization or an
 * explicit reset. Mutations of one session run one at a time through
 * runExclusive(); different sessions never wait on each other.
 */
@Injectable()
export class DraftStoreService {
  private readonly logger = new Logger(DraftStoreService.name);
  private readonly sessions = new Map<string, DraftSession>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly historyLimit: number;

  constructor(
    @Inject(INVOICE_PROFILE) private readonly profile: InvoiceProfile,
    private readonly configService: ConfigService,
  ) {
    this.historyLimit = this.configService.get<number>(
      'SESSION_HISTORY_LIMIT',
      10,
    );
  }

  emptyDraft(): InvoiceDraft {
    return createEmptyDraft(this.profile.defaultTaxPercent);
  }

  getSession(sessionId: string): DraftSession {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = {
        draft: this.emptyDraft(),
        phase: 'EMPTY',
        history: [],
      };
      this.sessions.set(sessionId, session);
      this.logger.log(`Created draft for session ${sessionId}`);
    }
    return session;
  }

  // Reads without creating
  peekSession(sessionId: string): DraftSession | undefined {
    return this.sessions.get(sessionId);
  }

  saveDraft(
    sessionId: string,
    draft: InvoiceDraft,
    phase: ConversationPhase,
  ): DraftSession {
    const session = this.getSession(sessionId);
    session.draft = draft;
    session.phase = phase;
    return session;
  }

  appendHistory(sessionId: string, utterance: string): void {
    const session = this.getSession(sessionId);
    session.history = [...session.history, utterance].slice(-this.historyLimit);
  }

  resetSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.logger.log(`Cleared session ${sessionId}`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Runs task after every earlier task for the same session has settled.
   * The lock is released even when task throws.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(sessionId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }
}
