import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConversationService } from '../services/conversation.service';
import { InvoiceStorageService } from '../services/invoice-storage.service';
import { DEFAULT_SESSION_ID, InvoiceController } from './invoice.controller';

describe('InvoiceController', () => {
  let controller: InvoiceController;
  const conversationService = {
    processMessage: jest.fn(),
    getSession: jest.fn(),
    resetSession: jest.fn(),
  };
  const invoiceStorage = { list: jest.fn(), get: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [InvoiceController],
      providers: [
        { provide: ConversationService, useValue: conversationService },
        { provide: InvoiceStorageService, useValue: invoiceStorage },
      ],
    }).compile();

    controller = module.get<InvoiceController>(InvoiceController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('trims the message and uses the default session', async () => {
    conversationService.processMessage.mockResolvedValue({
      text: 'ok',
      type: 'info',
    });

    const response = await controller.chat({ message: '  hello  ' });

    expect(response).toEqual({ text: 'ok', type: 'info' });
    expect(conversationService.processMessage).toHaveBeenCalledWith(
      'hello',
      DEFAULT_SESSION_ID,
    );
  });

  it('passes the session id through', async () => {
    conversationService.processMessage.mockResolvedValue({
      text: 'ok',
      type: 'info',
    });

    await controller.chat({ message: 'invoice', sessionId: ' counter-2 ' });

    expect(conversationService.processMessage).toHaveBeenCalledWith(
      'invoice',
      'counter-2',
    );
  });

  it('reports whether a session was cleared', () => {
    conversationService.resetSession.mockReturnValue(false);

    expect(controller.resetSession('missing')).toEqual({ cleared: false });
  });

  it('returns a stored invoice', async () => {
    invoiceStorage.get.mockResolvedValue({ id: 'INV-ABC123' });

    await expect(controller.getInvoice('INV-ABC123')).resolves.toEqual({
      id: 'INV-ABC123',
    });
  });

  it('throws NotFoundException for an unknown invoice', async () => {
    invoiceStorage.get.mockResolvedValue(undefined);

    await expect(controller.getInvoice('INV-000000')).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
