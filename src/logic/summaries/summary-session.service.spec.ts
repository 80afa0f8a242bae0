import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RetryClock } from '../../utils/retry';
import { DocumentTextService } from '../documents/document-text.service';
import { TEXT_GENERATION_CLIENT, TextGenerationRequest } from '../gemini/text-generation.client';
import { RefinementService } from './refinement.service';
import { RETRY_CLOCK, RemoteCallService } from './remote-call.service';
import { SummaryGenerationService } from './summary-generation.service';
import { DocumentUpload, SummarySessionService } from './summary-session.service';

const upload: DocumentUpload = {
  name: 'report.txt',
  sizeBytes: 11,
  mimeType: 'text/plain',
  bytes: Buffer.from('hello world'),
};

function hangUntilAborted(request: TextGenerationRequest): Promise<string> {
  return new Promise((_resolve, reject) => {
    request.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}

describe('SummarySessionService', () => {
  let service: SummarySessionService;
  let generateText: jest.Mock<Promise<string>, [TextGenerationRequest]>;

  beforeEach(async () => {
    generateText = jest.fn<Promise<string>, [TextGenerationRequest]>();
    const clock: RetryClock = { sleep: async () => undefined, random: () => 0.5 };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SummarySessionService,
        SummaryGenerationService,
        RefinementService,
        RemoteCallService,
        DocumentTextService,
        { provide: TEXT_GENERATION_CLIENT, useValue: { generateText } },
        { provide: ConfigService, useValue: { get: (_key: string, fallback?: unknown) => fallback } },
        { provide: RETRY_CLOCK, useValue: clock },
      ],
    }).compile();

    service = module.get<SummarySessionService>(SummarySessionService);
  });

  async function sessionWithVersions(count: number): Promise<string> {
    const { sessionId } = service.createSession();
    generateText.mockResolvedValueOnce('version 1');
    await service.generate(sessionId, { file: upload, size: 'short' });
    for (let n = 2; n <= count; n++) {
      generateText.mockResolvedValueOnce(`version ${n}`);
      await service.refine(sessionId, { intent: 'longer' });
    }
    return sessionId;
  }

  it('creates an empty session', () => {
    const view = service.createSession();
    expect(view).toMatchObject({
      conversationId: null,
      versionCount: 0,
      cursor: null,
      currentVersion: null,
      canUndo: false,
      canRedo: false,
      pending: null,
    });
    expect(service.getSession(view.sessionId).sessionId).toBe(view.sessionId);
  });

  it('reports unknown sessions', () => {
    expect(() => service.getSession('missing')).toThrow(expect.objectContaining({ code: 'SessionNotFound' }));
  });

  it('puts the cursor on version 1 after generation', async () => {
    const { sessionId } = service.createSession();
    generateText.mockResolvedValue('first summary');

    const result = await service.generate(sessionId, { file: upload, size: 'short' });

    expect(result.status).toBe('committed');
    expect(result.session).toMatchObject({
      versionCount: 1,
      cursor: 0,
      canUndo: false,
      canRedo: false,
      refinementCount: 0,
      pending: null,
      document: { name: 'report.txt', extension: 'txt', mimeType: 'text/plain', sizeBytes: 11 },
    });
    expect(result.session.currentVersion?.content).toBe('first summary');
  });

  it('moves the cursor to each new refinement and navigates history', async () => {
    const sessionId = await sessionWithVersions(3);
    expect(service.getSession(sessionId).cursor).toBe(2);

    expect(service.undo(sessionId).cursor).toBe(1);
    expect(service.undo(sessionId)).toMatchObject({ cursor: 0, canUndo: false, canRedo: true, hasNavigatedBack: true });
    expect(() => service.undo(sessionId)).toThrow('Cannot undo - already at first version');
    expect(service.redo(sessionId).currentVersion?.content).toBe('version 2');
    expect(service.jumpTo(sessionId, 2)).toMatchObject({ cursor: 2, hasNavigatedBack: false });
    expect(() => service.jumpTo(sessionId, 7)).toThrow(expect.objectContaining({ code: 'OutOfRange' }));
  });

  it('moves the cursor to the new version even after navigating back', async () => {
    const sessionId = await sessionWithVersions(2);
    service.undo(sessionId);
    generateText.mockResolvedValueOnce('version 3');

    const result = await service.refine(sessionId, { intent: 'simpler' });

    expect(result.session.cursor).toBe(2);
    expect(result.session.versionCount).toBe(3);
  });

  it('estimates the tokens held in the conversation', async () => {
    const { sessionId } = service.createSession();
    expect(service.getSession(sessionId).estimatedTokens).toBe(0);

    const generated = await sessionWithVersions(2);
    const chars = service.serialize(generated).messages.reduce((sum, m) => sum + m.content.length, 0);

    expect(service.getSession(generated).estimatedTokens).toBe(Math.ceil(chars / 4));
    expect(service.getSession(generated).estimatedTokens).toBeGreaterThan(0);
  });

  it('rejects a second call while one is in flight', async () => {
    const sessionId = await sessionWithVersions(1);
    let release: (value: string) => void = () => undefined;
    generateText.mockImplementationOnce(() => new Promise<string>(resolve => (release = resolve)));

    const first = service.refine(sessionId, { intent: 'shorter' });
    expect(service.getSession(sessionId).pending).toMatchObject({ kind: 'refinement', phase: 'awaitingRemote' });

    await expect(service.refine(sessionId, { intent: 'longer' })).rejects.toMatchObject({ code: 'RequestInFlight' });
    await expect(service.generate(sessionId, { file: upload, size: 'long' })).rejects.toMatchObject({
      code: 'RequestInFlight',
    });
    // navigation stays available
    expect(service.getSession(sessionId).cursor).toBe(0);

    release('short version');
    const result = await first;
    expect(result.status).toBe('committed');
    expect(result.session.versionCount).toBe(2);
    expect(result.session.pending).toBeNull();
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  it('reports a processing estimate while generating', async () => {
    const { sessionId } = service.createSession();
    generateText.mockImplementationOnce(hangUntilAborted);

    const pendingCall = service.generate(sessionId, { file: upload, size: 'short' });
    expect(service.getSession(sessionId).pending).toMatchObject({ kind: 'generation', estimatedProcessingMs: 10_000 });

    service.cancel(sessionId);
    await expect(pendingCall).resolves.toMatchObject({ status: 'cancelled', session: { versionCount: 0 } });
  });

  it('cancels a pending refinement without committing anything', async () => {
    const sessionId = await sessionWithVersions(2);
    generateText.mockImplementationOnce(hangUntilAborted);

    const pendingCall = service.refine(sessionId, { intent: 'technical' });
    service.cancel(sessionId);
    const result = await pendingCall;

    expect(result.status).toBe('cancelled');
    expect(result.session).toMatchObject({ versionCount: 2, cursor: 1, pending: null });
    expect(service.serialize(sessionId).messages).toHaveLength(4);
  });

  it('has nothing to cancel when idle', () => {
    const { sessionId } = service.createSession();
    expect(() => service.cancel(sessionId)).toThrow(expect.objectContaining({ code: 'NothingToCancel' }));
  });

  it('refuses to refine or navigate before generation', async () => {
    const { sessionId } = service.createSession();
    await expect(service.refine(sessionId, { intent: 'shorter' })).rejects.toMatchObject({ code: 'NoSummaryToRefine' });
    expect(() => service.undo(sessionId)).toThrow(expect.objectContaining({ code: 'NoVersions' }));
    expect(service.history(sessionId)).toEqual([]);
  });

  it('compares versions by number', async () => {
    const sessionId = await sessionWithVersions(2);
    generateText.mockResolvedValueOnce('one two three four');
    await service.refine(sessionId, { intent: 'longer' });

    expect(service.compare(sessionId, 1, 3)).toMatchObject({ wordDelta: 2, description: '+2 words (100.0% longer)' });
    expect(() => service.compare(sessionId, 1, 9)).toThrow('Invalid version number 9');
  });

  it('summarizes statistics and history', async () => {
    const sessionId = await sessionWithVersions(3);
    service.undo(sessionId);

    expect(service.statistics(sessionId)).toMatchObject({ count: 3, totalRefinements: 2, averageWordCount: 2 });
    expect(service.history(sessionId).map(h => h.isCurrent)).toEqual([false, true, false]);
  });

  it('exports the version under the cursor by default', async () => {
    const sessionId = await sessionWithVersions(2);
    service.undo(sessionId);

    expect(service.export(sessionId, 'markdown').filename).toBe('report-summary-v1.md');
    expect(service.export(sessionId, 'html', 2)).toMatchObject({
      filename: 'report-summary-v2.html',
      contentType: 'text/html; charset=utf-8',
    });
  });

  it('imports a serialized conversation with the cursor on the latest version', async () => {
    const sessionId = await sessionWithVersions(3);
    const serialized = JSON.parse(JSON.stringify(service.serialize(sessionId)));

    const imported = service.importConversation(serialized);

    expect(imported.sessionId).not.toBe(sessionId);
    expect(imported).toMatchObject({ versionCount: 3, cursor: 2, canRedo: false, canUndo: true });
    expect(imported.conversationId).toBe(service.getSession(sessionId).conversationId);
  });

  it('rejects an invalid import', () => {
    expect(() => service.importConversation({ conversationId: 'x' })).toThrow(
      expect.objectContaining({ code: 'InvalidConversation' }),
    );
  });

  it('cancels the pending call and forgets the session on delete', async () => {
    const sessionId = await sessionWithVersions(1);
    generateText.mockImplementationOnce(hangUntilAborted);

    const pendingCall = service.refine(sessionId, { intent: 'shorter' });
    service.deleteSession(sessionId);

    await expect(pendingCall).resolves.toMatchObject({ status: 'cancelled' });
    expect(() => service.getSession(sessionId)).toThrow(expect.objectContaining({ code: 'SessionNotFound' }));
  });
});
