import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { RunnableSequence } from '@langchain/core/runnables';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import axios from 'axios';
import { describeError } from '../utils/errors';

export const DEFAULT_HELP_TEXT =
  'How can I help you today? To create an invoice, tell me the customer, their email ' +
  'and the items, for example: "invoice for customer: Asha Rao, email: asha@example.com, 2x Notebook @ 120".';

const assistantPromptTemplate = ChatPromptTemplate.fromTemplate(
  `You are a friendly shopping and billing assistant.
  Answer the user's message briefly. If they want to bill, check out or create an
  invoice, tell them to share the customer name, email and items written as
  "<qty> x <name> @ <price>".

  ** User message: ** {message}`,
);

/**
 * Answers messages that are not about the invoice being drafted.
 *
 * ASSISTANT_URL (an HTTP knowledge service) is tried first, then the OpenAI
 * chain. respond() returns null when neither is configured or both fail.
 */
@Injectable()
export class GeneralAssistantService implements OnModuleInit {
  private readonly logger = new Logger(GeneralAssistantService.name);
  private readonly assistantUrl: string | undefined;
  private readonly assistantLanguage: string;
  private chain?: RunnableSequence<{ message: string }, string>;

  constructor(private readonly configService: ConfigService) {
    this.assistantUrl = this.configService.get<string>('ASSISTANT_URL');
    this.assistantLanguage = this.configService.get<string>(
      'ASSISTANT_LANGUAGE',
      'English',
    );
  }

  onModuleInit() {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      return;
    }
    const model = new ChatOpenAI({
      openAIApiKey: apiKey,
      model: this.configService.get<string>('OPENAI_MODEL_NAME', 'gpt-4'),
      temperature: 0.3,
      timeout: this.configService.get<number>('LLM_TIMEOUT_MS', 15000),
      maxRetries: 1,
    });
    this.chain = RunnableSequence.from<{ message: string }, string>([
      assistantPromptTemplate,
      model,
      new StringOutputParser(),
    ]);
  }

  async respond(message: string, sessionId: string): Promise<string | null> {
    const fromService = await this.askAssistantService(message, sessionId);
    if (fromService) {
      return fromService;
    }
    return this.askModel(message);
  }

  private async askAssistantService(
    message: string,
    sessionId: string,
  ): Promise<string | null> {
    if (!this.assistantUrl) {
      return null;
    }
    this.logger.log(`[${sessionId}] Sending to assistant service: ${message}`);
    try {
      const response = await axios.post<{ response?: unknown }>(
        this.assistantUrl,
        {
          message,
          language: this.assistantLanguage,
          uniqueId: sessionId,
        },
        { timeout: this.configService.get<number>('LLM_TIMEOUT_MS', 15000) },
      );
      const text = response.data.response;
      return typeof text === 'string' && text.trim() ? text : null;
    } catch (error) {
      const { message: reason, stack } = describeError(error);
      this.logger.error(`Assistant service failed: ${reason}`, stack);
      return null;
    }
  }

  private async askModel(message: string): Promise<string | null> {
    if (!this.chain) {
      return null;
    }
    try {
      const text = await this.chain.invoke({ message });
      return text.trim() ? text : null;
    } catch (error) {
      const { message: reason, stack } = describeError(error);
      this.logger.error(`Assistant model failed: ${reason}`, stack);
      return null;
    }
  }
}
