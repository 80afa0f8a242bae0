import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Response } from 'express';
import { CompareQueryDto, ExportQueryDto, GenerateSummaryDto, RefineSummaryDto } from './dto/summary.dto';
import { EXAMPLE_INSTRUCTIONS, REFINEMENT_ACTIONS, SIZE_TEMPLATES } from './prompts';
import { SummarySessionService } from './summary-session.service';
import { SUMMARY_SIZES } from './types';

@Controller('summaries')
export class SummariesController {
  constructor(private readonly sessionService: SummarySessionService) { }

  @Get('catalog')
  getCatalog() {
    return {
      sizes: SUMMARY_SIZES.map(size => {
        const { label, description, wordCount } = SIZE_TEMPLATES[size];
        return { id: size, label, description, wordCount };
      }),
      refinementActions: Object.values(REFINEMENT_ACTIONS).map(({ id, label, description }) => ({ id, label, description })),
      exampleInstructions: EXAMPLE_INSTRUCTIONS,
    };
  }

  @Post('sessions')
  createSession() {
    return this.sessionService.createSession();
  }

  @Post('sessions/import')
  importSession(@Body() body: unknown) {
    return this.sessionService.importConversation(body);
  }

  @Get('sessions/:id')
  getSession(@Param('id') id: string) {
    return this.sessionService.getSession(id);
  }

  @Delete('sessions/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  deleteSession(@Param('id') id: string) {
    this.sessionService.deleteSession(id);
  }

  @Post('sessions/:id/generate')
  @UseInterceptors(FileInterceptor('file'))
  async generate(
    @Param('id') id: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: GenerateSummaryDto,
  ) {
    if (!file) {
      throw new HttpException('No file uploaded', HttpStatus.BAD_REQUEST);
    }
    return this.sessionService.generate(id, {
      file: {
        name: file.originalname,
        sizeBytes: file.size,
        mimeType: file.mimetype,
        bytes: file.buffer,
      },
      size: body.size,
      customInstructions: body.customInstructions,
    });
  }

  @Post('sessions/:id/refine')
  async refine(@Param('id') id: string, @Body() body: RefineSummaryDto) {
    return this.sessionService.refine(id, { intent: body.intent, customFeedback: body.customFeedback });
  }

  @Post('sessions/:id/cancel')
  cancel(@Param('id') id: string) {
    return this.sessionService.cancel(id);
  }

  @Post('sessions/:id/undo')
  undo(@Param('id') id: string) {
    return this.sessionService.undo(id);
  }

  @Post('sessions/:id/redo')
  redo(@Param('id') id: string) {
    return this.sessionService.redo(id);
  }

  @Post('sessions/:id/versions/:index/select')
  selectVersion(@Param('id') id: string, @Param('index', ParseIntPipe) index: number) {
    return this.sessionService.jumpTo(id, index);
  }

  @Get('sessions/:id/versions')
  getVersions(@Param('id') id: string) {
    return this.sessionService.history(id);
  }

  @Get('sessions/:id/statistics')
  getStatistics(@Param('id') id: string) {
    return this.sessionService.statistics(id);
  }

  @Get('sessions/:id/compare')
  compare(@Param('id') id: string, @Query() query: CompareQueryDto) {
    return this.sessionService.compare(id, query.from, query.to);
  }

  @Get('sessions/:id/export')
  exportSummary(@Param('id') id: string, @Query() query: ExportQueryDto, @Res() res: Response) {
    const exported = this.sessionService.export(id, query.format ?? 'markdown', query.version);
    res.setHeader('Content-Type', exported.contentType);
    res.setHeader('Content-Disposition', `attachment; filename="${exported.filename}"`);
    res.send(exported.body);
  }

  @Get('sessions/:id/conversation')
  getConversation(@Param('id') id: string) {
    return this.sessionService.serialize(id);
  }
}
