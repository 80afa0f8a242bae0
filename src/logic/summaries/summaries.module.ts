import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { DocumentsModule } from '../documents/documents.module';
import { uploadOptions } from '../documents/upload-options';
import { GeminiModule } from '../gemini/gemini.module';
import { RefinementService } from './refinement.service';
import { RemoteCallService } from './remote-call.service';
import { SummariesController } from './summaries.controller';
import { SummaryGenerationService } from './summary-generation.service';
import { SummarySessionService } from './summary-session.service';

@Module({
    imports: [
        GeminiModule,
        DocumentsModule,
        MulterModule.registerAsync({ inject: [ConfigService], useFactory: uploadOptions }),
    ],
    controllers: [SummariesController],
    providers: [RemoteCallService, SummaryGenerationService, RefinementService, SummarySessionService],
    exports: [SummarySessionService],
})
export class SummariesModule {}
