import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { TEXT_GENERATION_CLIENT } from './text-generation.client';

@Module({
    providers: [GeminiService, { provide: TEXT_GENERATION_CLIENT, useExisting: GeminiService }],
    exports: [TEXT_GENERATION_CLIENT],
})
export class GeminiModule {}
