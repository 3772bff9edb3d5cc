import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Logger,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ChatRequestDto } from '../dto/chat-request.dto';
import { AssistantResponse } from '../interfaces/assistant-response';
import { InvoiceRecord } from '../interfaces/invoice-record';
import {
  ConversationService,
  SessionSnapshot,
} from '../services/conversation.service';
import { InvoiceStorageService } from '../services/invoice-storage.service';

export const DEFAULT_SESSION_ID = 'default';

@Controller('invoices')
export class InvoiceController {
  private readonly logger = new Logger(InvoiceController.name);

  constructor(
    private readonly conversationService: ConversationService,
    private readonly invoiceStorage: InvoiceStorageService,
  ) {}

  @Post('chat')
  @HttpCode(200)
  async chat(@Body() request: ChatRequestDto): Promise<AssistantResponse> {
    const sessionId = request.sessionId?.trim() || DEFAULT_SESSION_ID;
    return this.conversationService.processMessage(
      request.message.trim(),
      sessionId,
    );
  }

  @Get()
  async listInvoices(): Promise<InvoiceRecord[]> {
    return this.invoiceStorage.list();
  }

  @Get('sessions/:sessionId')
  getSession(@Param('sessionId') sessionId: string): SessionSnapshot {
    return this.conversationService.getSession(sessionId);
  }

  @Delete('sessions/:sessionId')
  resetSession(@Param('sessionId') sessionId: string): { cleared: boolean } {
    const cleared = this.conversationService.resetSession(sessionId);
    this.logger.log(`Reset requested for session ${sessionId}`);
    return { cleared };
  }

  @Get(':id')
  async getInvoice(@Param('id') id: string): Promise<InvoiceRecord> {
    const invoice = await this.invoiceStorage.get(id);
    if (!invoice) {
      throw new NotFoundException(`Invoice ${id} not found`);
    }
    return invoice;
  }
}
