import { Injectable, Logger } from '@nestjs/common';
import { Annotation, END, START, StateGraph } from '@langchain/langgraph';
import { AssistantResponse } from '../interfaces/assistant-response';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { ValidationResult } from '../interfaces/validation-result';
import { ConversationPhase, RequiredField } from '../types/invoice.types';
import { describeError } from '../utils/errors';
import { AiExtractionService } from './ai-extraction.service';
import { DraftStoreService } from './draft-store.service';
import { DraftUpdaterService } from './draft-updater.service';
import {
  DEFAULT_HELP_TEXT,
  GeneralAssistantService,
} from './general-assistant.service';
import { InvoiceRendererService } from './invoice-renderer.service';
import { InvoiceStorageService } from './invoice-storage.service';
import { ValidationService } from './validation.service';

// invoice, bill, checkout, an '@' or a GST/tax keyword
const INVOICE_KEYWORDS = /\b(?:invoice|bill|checkout|gst|tax)|@/i;

const BLOCKING_PROMPTS: Partial<Record<RequiredField, string>> = {
  invoiceNumber: 'What invoice number should I use?',
  items: 'Which items should I add? For example: 2x Notebook @ 120',
};

export const ConversationAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  message: Annotation<string>,
  relevant: Annotation<boolean>,
  validation: Annotation<ValidationResult | undefined>,
  finalizedDraft: Annotation<InvoiceDraft | undefined>,
  response: Annotation<AssistantResponse | undefined>,
});

export type ConversationGraphState = typeof ConversationAnnotation.State;
export type ConversationGraphUpdate = typeof ConversationAnnotation.Update;

type ConversationNode = (
  state: ConversationGraphState,
) => Promise<ConversationGraphUpdate>;

interface ConversationNodes {
  classifyMessage: ConversationNode;
  updateDraft: ConversationNode;
  requestDetails: ConversationNode;
  finalizeInvoice: ConversationNode;
  generalAssistant: ConversationNode;
}

/**
 * ----------------------------------------------------------------
 * Graph - the per-message flow of a conversation
 * ----------------------------------------------------------------
 * classify_message -> update_draft -> request_details | finalize_invoice
 * classify_message -> general_assistant
 */
export function buildConversationGraph(nodes: ConversationNodes) {
  return new StateGraph(ConversationAnnotation)
    .addNode('classify_message', nodes.classifyMessage)
    .addNode('update_draft', nodes.updateDraft)
    .addNode('request_details', nodes.requestDetails)
    .addNode('finalize_invoice', nodes.finalizeInvoice)
    .addNode('general_assistant', nodes.generalAssistant)
    .addEdge(START, 'classify_message')
    .addConditionalEdges(
      'classify_message',
      (state: ConversationGraphState) =>
        state.relevant ? 'update_draft' : 'general_assistant',
      ['update_draft', 'general_assistant'],
    )
    .addConditionalEdges(
      'update_draft',
      (state: ConversationGraphState) =>
        state.validation?.complete ? 'finalize_invoice' : 'request_details',
      ['finalize_invoice', 'request_details'],
    )
    .addEdge('request_details', END)
    .addEdge('finalize_invoice', END)
    .addEdge('general_assistant', END)
    .compile();
}

export function isInvoiceRelated(message: string): boolean {
  return INVOICE_KEYWORDS.test(message);
}

export interface SessionSnapshot {
  sessionId: string;
  phase: ConversationPhase;
  draft: InvoiceDraft;
  validation: ValidationResult;
}

@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly graph: ReturnType<typeof buildConversationGraph>;

  constructor(
    private readonly draftStore: DraftStoreService,
    private readonly draftUpdater: DraftUpdaterService,
    private readonly validation: ValidationService,
    private readonly renderer: InvoiceRendererService,
    private readonly storage: InvoiceStorageService,
    private readonly aiExtraction: AiExtractionService,
    private readonly generalAssistant: GeneralAssistantService,
  ) {
    this.graph = buildConversationGraph({
      classifyMessage: (state) => this.classifyMessage(state),
      updateDraft: (state) => this.updateDraft(state),
      requestDetails: (state) => this.requestDetails(state),
      finalizeInvoice: (state) => this.finalizeInvoice(state),
      generalAssistant: (state) => this.answerGenerally(state),
    });
    this.logger.log(
      `Conversation graph ready (profile: ${this.validation.profileName})`,
    );
  }

  async processMessage(
    message: string,
    sessionId: string,
  ): Promise<AssistantResponse> {
    try {
      const result = await this.graph.invoke({ sessionId, message });
      if (!result.response) {
        throw new Error('Conversation graph finished without a response');
      }
      return result.response;
    } catch (error) {
      const { message: reason, stack } = describeError(error);
      this.logger.error(`Error processing message: ${reason}`, stack);
      return {
        text: "I'm sorry, I encountered an error processing your request.",
        type: 'info',
      };
    }
  }

  getSession(sessionId: string): SessionSnapshot {
    const session = this.draftStore.peekSession(sessionId);
    const draft = session?.draft ?? this.draftStore.emptyDraft();
    return {
      sessionId,
      phase: session?.phase ?? 'EMPTY',
      draft,
      validation: this.validation.validate(draft),
    };
  }

  resetSession(sessionId: string): boolean {
    return this.draftStore.resetSession(sessionId);
  }

  /**
   * Nodes
   */
  private async classifyMessage(
    state: ConversationGraphState,
  ): Promise<ConversationGraphUpdate> {
    // Sticky: once the draft has items every message belongs to it
    const hasItems =
      (this.draftStore.peekSession(state.sessionId)?.draft.items.length ?? 0) >
      0;
    const relevant = hasItems || isInvoiceRelated(state.message);
    this.logger.log(
      `[${state.sessionId}] Message routed to ${relevant ? 'invoice draft' : 'general assistant'}`,
    );
    return { relevant };
  }

  private async updateDraft(
    state: ConversationGraphState,
  ): Promise<ConversationGraphUpdate> {
    const { sessionId, message } = state;
    const snapshot = this.draftStore.getSession(sessionId);

    // The external call runs outside the session lock
    const patch = await this.aiExtraction.extract(
      snapshot.draft,
      snapshot.history,
      message,
    );

    return this.draftStore.runExclusive(sessionId, () => {
      const session = this.draftStore.getSession(sessionId);
      const draft = this.draftUpdater.update(session.draft, message, patch);
      this.draftStore.saveDraft(sessionId, draft, 'DRAFTING');
      this.draftStore.appendHistory(sessionId, message);

      const validation = this.validation.validate(draft);
      if (!validation.complete) {
        this.draftStore.saveDraft(sessionId, draft, 'BLOCKED');
        this.logger.log(
          `[${sessionId}] Draft blocked, missing: ${validation.missing.join(', ')}`,
        );
        return { validation };
      }

      this.draftStore.saveDraft(sessionId, draft, 'COMPLETE');
      this.draftStore.resetSession(sessionId);
      this.logger.log(`[${sessionId}] Draft complete, finalizing`);
      return { validation, finalizedDraft: draft };
    });
  }

  private async requestDetails(
    state: ConversationGraphState,
  ): Promise<ConversationGraphUpdate> {
    const validation = state.validation;
    if (!validation) {
      throw new Error('request_details reached without a validation result');
    }
    const tips = [
      ...validation.missing.flatMap((field) => BLOCKING_PROMPTS[field] ?? []),
      ...validation.suggestions,
    ];
    const text =
      "I've updated your draft, but I'm still missing some details:\n\n" +
      tips.map((tip) => `• ${tip}`).join('\n') +
      "\n\nJust type them in and I'll update the bill!";

    return {
      response: { text, type: 'warning', missingFields: validation.missing },
    };
  }

  private async finalizeInvoice(
    state: ConversationGraphState,
  ): Promise<ConversationGraphUpdate> {
    const draft = state.finalizedDraft;
    if (!draft) {
      throw new Error('finalize_invoice reached without a finalized draft');
    }
    const rendered = this.renderer.render(draft);
    const header = 'Invoice Generated Successfully!\n\n';

    try {
      const record = await this.storage.save(draft, rendered);
      return {
        response: {
          text: header + rendered.text,
          type: 'invoice',
          savedInvoiceId: record.id,
        },
      };
    } catch (error) {
      // The session is already cleared; the caller still gets the invoice
      const { message: reason, stack } = describeError(error);
      this.logger.error(
        `[${state.sessionId}] Saving invoice failed: ${reason}`,
        stack,
      );
      return {
        response: {
          text:
            header +
            rendered.text +
            '\n\nNote: this invoice could not be saved. Please keep a copy of it.',
          type: 'invoice',
          saveFailed: true,
        },
      };
    }
  }

  private async answerGenerally(
    state: ConversationGraphState,
  ): Promise<ConversationGraphUpdate> {
    const text = await this.generalAssistant.respond(
      state.message,
      state.sessionId,
    );
    return { response: { text: text ?? DEFAULT_HELP_TEXT, type: 'info' } };
  }
}
