import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { RunnableSequence } from '@langchain/core/runnables';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { JsonOutputParser } from '@langchain/core/output_parsers';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { describeError } from '../utils/errors';

const extractionPromptTemplate = ChatPromptTemplate.fromTemplate(
  `You are an assistant that extracts invoice details from chat messages.
  Read the latest user message in the context of the recent conversation and
  the current invoice draft, and report only what the latest message adds or changes.

  ** Current draft: ** {draft}
  ** Recent conversation: ** {history}
  ** Latest user message: ** {message}

  Rules:
  - customerName, customerEmail, customerGst (GST or tax id), invoiceNumber,
    invoiceDate and dueDate (YYYY-MM-DD), currency (3-letter code), taxPercent,
    shippingFee, discount (amount), discountCode.
  - Use null for anything the latest message does not mention. Never repeat values from the draft.
  - items: only NEW items described in free wording. Items already written as
    "<qty> x <name> @ <price>" are captured elsewhere; leave them out.
  - Numbers are plain JSON numbers without currency symbols.

  Return ONLY a JSON object with this structure:
  {{
    "invoiceNumber": string | null,
    "customerName": string | null,
    "customerEmail": string | null,
    "customerGst": string | null,
    "invoiceDate": string | null,
    "dueDate": string | null,
    "currency": string | null,
    "taxPercent": number | null,
    "shippingFee": number | null,
    "discount": number | null,
    "discountCode": string | null,
    "items": [{{ "name": string, "quantity": number, "unitPrice": number }}]
  }}`,
);

/**
 * Extraction fallback backed by an OpenAI chat model.
 *
 * Returns the model's JSON as-is (unknown); the draft updater validates it.
 * Any failure, or a missing OPENAI_API_KEY, yields null.
 */
@Injectable()
export class AiExtractionService implements OnModuleInit {
  private readonly logger = new Logger(AiExtractionService.name);
  private chain?: RunnableSequence<Record<string, string>, unknown>;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      this.logger.warn(
        'OPENAI_API_KEY not set, AI extraction fallback disabled',
      );
      return;
    }
    const openAiModel = this.configService.get<string>(
      'OPENAI_MODEL_NAME',
      'gpt-4',
    );
    const model = new ChatOpenAI({
      openAIApiKey: apiKey,
      model: openAiModel,
      temperature: 0,
      timeout: this.configService.get<number>('LLM_TIMEOUT_MS', 15000),
      maxRetries: 1,
    });

    this.chain = RunnableSequence.from<Record<string, string>, unknown>([
      extractionPromptTemplate,
      model,
      new JsonOutputParser(),
    ]);
    this.logger.log(`AI extraction initialized using ${openAiModel}`);
  }

  get enabled(): boolean {
    return this.chain !== undefined;
  }

  async extract(
    draft: InvoiceDraft,
    history: string[],
    message: string,
  ): Promise<unknown> {
    if (!this.chain) {
      return null;
    }
    try {
      return await this.chain.invoke({
        draft: JSON.stringify(draft),
        history: history.join('\n'),
        message,
      });
    } catch (error) {
      const { message: reason, stack } = describeError(error);
      this.logger.error(`AI extraction failed: ${reason}`, stack);
      return null;
    }
  }
}
