import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INVOICE_PROFILE, profileFromConfig } from './config/invoice-profile';
import { HealthController } from './controllers/health.controller';
import { InvoiceController } from './controllers/invoice.controller';
import { AiExtractionService } from './services/ai-extraction.service';
import { ConversationService } from './services/conversation.service';
import { DraftStoreService } from './services/draft-store.service';
import { DraftUpdaterService } from './services/draft-updater.service';
import { FieldExtractorService } from './services/field-extractor.service';
import { GeneralAssistantService } from './services/general-assistant.service';
import { InvoiceRendererService } from './services/invoice-renderer.service';
import { InvoiceStorageService } from './services/invoice-storage.service';
import { ValidationService } from './services/validation.service';
import { CLOCK, systemClock } from './utils/dates';

@Module({
  providers: [
    {
      provide: INVOICE_PROFILE,
      useFactory: profileFromConfig,
      inject: [ConfigService],
    },
    { provide: CLOCK, useValue: systemClock },
    FieldExtractorService,
    DraftStoreService,
    DraftUpdaterService,
    ValidationService,
    InvoiceRendererService,
    InvoiceStorageService,
    AiExtractionService,
    GeneralAssistantService,
    ConversationService,
  ],
  controllers: [InvoiceController, HealthController],
  exports: [ConversationService],
})
export class InvoiceModule {}
