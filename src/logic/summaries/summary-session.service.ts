import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { describeDocument, estimateProcessingTimeMs } from '../documents/file-metadata';
import { NavigationError, StateError } from './errors';
import { RefineSummaryInput, RefinementOutcome, RefinementService } from './refinement.service';
import { ExportedSummary, exportSummary } from './summary-export';
import { SerializedConversation, SummaryConversation } from './summary-conversation';
import { GenerationOutcome, SummaryGenerationService } from './summary-generation.service';
import { ExportFormat, GenerationPhase, SummaryConfig, SummarySize, SummaryVersion } from './types';
import { NavigationResult, VersionComparison, VersionHistoryItem, VersionStatistics } from './version-store';

export interface DocumentUpload {
    name: string;
    sizeBytes: number;
    mimeType?: string;
    bytes?: Buffer;
}

export interface GenerateRequest {
    file: DocumentUpload;
    size: SummarySize;
    customInstructions?: string;
}

interface PendingCall {
    kind: 'generation' | 'refinement';
    phase: GenerationPhase;
    startedAt: Date;
    estimatedProcessingMs?: number;
    controller: AbortController;
}

interface SummarySession {
    sessionId: string;
    createdAt: Date;
    conversation?: SummaryConversation;
    cursor?: number;
    pending?: PendingCall;
}

export interface SessionView {
    sessionId: string;
    createdAt: Date;
    conversationId: string | null;
    document: { name: string; sizeBytes: number; extension: string; mimeType: string } | null;
    config: SummaryConfig | null;
    versionCount: number;
    cursor: number | null;
    currentVersion: SummaryVersion | null;
    canUndo: boolean;
    canRedo: boolean;
    hasNavigatedBack: boolean;
    refinementCount: number;
    estimatedTokens: number;
    pending: Omit<PendingCall, 'controller'> | null;
}

export interface CallResult {
    status: 'committed' | 'cancelled';
    session: SessionView;
}

/**
 * Owns the per-client conversation and version cursor. At most one remote
 * call runs per session; navigation stays available while it is in flight.
 */
@Injectable()
export class SummarySessionService {
    private readonly logger = new Logger(SummarySessionService.name);
    private readonly sessions = new Map<string, SummarySession>();

    constructor(
        private readonly generationService: SummaryGenerationService,
        private readonly refinementService: RefinementService,
    ) { }

    createSession(): SessionView {
        const session: SummarySession = { sessionId: uuidv4(), createdAt: new Date() };
        this.sessions.set(session.sessionId, session);
        this.logger.log(`Session ${session.sessionId} created`);
        return this.toView(session);
    }

    getSession(sessionId: string): SessionView {
        return this.toView(this.require(sessionId));
    }

    deleteSession(sessionId: string): void {
        const session = this.require(sessionId);
        session.pending?.controller.abort();
        this.sessions.delete(sessionId);
        this.logger.log(`Session ${sessionId} deleted`);
    }

    async generate(sessionId: string, request: GenerateRequest): Promise<CallResult> {
        const session = this.require(sessionId);
        const document = describeDocument(request.file);
        const pending = this.begin(session, 'generation', estimateProcessingTimeMs(document.sizeBytes));

        let outcome: GenerationOutcome;
        try {
            outcome = await this.generationService.generate(
                {
                    document,
                    bytes: request.file.bytes,
                    size: request.size,
                    customInstructions: request.customInstructions,
                },
                { signal: pending.controller.signal, onPhase: phase => (pending.phase = phase) },
            );
        } finally {
            this.end(session, pending);
        }

        if (outcome.status === 'committed') {
            session.conversation = outcome.conversation;
            session.cursor = 0;
        }
        return { status: outcome.status, session: this.toView(session) };
    }

    async refine(sessionId: string, input: RefineSummaryInput): Promise<CallResult> {
        const session = this.require(sessionId);
        const conversation = session.conversation;
        if (!conversation) {
            throw new StateError('NoSummaryToRefine', 'No summary to refine');
        }
        const pending = this.begin(session, 'refinement');

        let outcome: RefinementOutcome;
        try {
            outcome = await this.refinementService.refine(conversation, input, {
                signal: pending.controller.signal,
                onPhase: phase => (pending.phase = phase),
            });
        } finally {
            this.end(session, pending);
        }

        if (outcome.status === 'committed' && session.conversation === conversation) {
            session.cursor = conversation.versions.length - 1;
        }
        return { status: outcome.status, session: this.toView(session) };
    }

    cancel(sessionId: string): SessionView {
        const session = this.require(sessionId);
        if (!session.pending) {
            throw new StateError('NothingToCancel', 'No request in progress');
        }
        this.logger.log(`Cancelling ${session.pending.kind} for session ${sessionId}`);
        session.pending.controller.abort();
        return this.toView(session);
    }

    undo(sessionId: string): SessionView {
        return this.navigate(sessionId, (conversation, cursor) => conversation.versions.undo(cursor));
    }

    redo(sessionId: string): SessionView {
        return this.navigate(sessionId, (conversation, cursor) => conversation.versions.redo(cursor));
    }

    jumpTo(sessionId: string, index: number): SessionView {
        return this.navigate(sessionId, (conversation, cursor) => conversation.versions.jumpTo(cursor, index));
    }

    history(sessionId: string): VersionHistoryItem[] {
        const session = this.require(sessionId);
        return session.conversation?.versions.history(session.cursor) ?? [];
    }

    statistics(sessionId: string): VersionStatistics {
        const session = this.require(sessionId);
        const conversation = this.requireConversation(session);
        return conversation.versions.statistics();
    }

    compare(sessionId: string, fromVersion: number, toVersion: number): VersionComparison {
        const { versions } = this.requireConversation(this.require(sessionId));
        const from = this.versionByNumber(versions.getByNumber(fromVersion), fromVersion);
        const to = this.versionByNumber(versions.getByNumber(toVersion), toVersion);
        return versions.compare(from, to);
    }

    export(sessionId: string, format: ExportFormat, versionNumber?: number): ExportedSummary {
        const session = this.require(sessionId);
        const conversation = this.requireConversation(session);
        const version = versionNumber !== undefined
            ? this.versionByNumber(conversation.versions.getByNumber(versionNumber), versionNumber)
            : this.current(session, conversation);
        return exportSummary(conversation.document.name, version, format);
    }

    serialize(sessionId: string): SerializedConversation {
        return this.requireConversation(this.require(sessionId)).toJSON();
    }

    importConversation(input: unknown): SessionView {
        const conversation = SummaryConversation.fromJSON(input);
        const session: SummarySession = {
            sessionId: uuidv4(),
            createdAt: new Date(),
            conversation,
            cursor: conversation.versions.length > 0 ? conversation.versions.length - 1 : undefined,
        };
        this.sessions.set(session.sessionId, session);
        this.logger.log(`Session ${session.sessionId} imported conversation ${conversation.conversationId}`);
        return this.toView(session);
    }

    private require(sessionId: string): SummarySession {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new StateError('SessionNotFound', `Session ${sessionId} not found`);
        }
        return session;
    }

    private requireConversation(session: SummarySession): SummaryConversation {
        if (!session.conversation || session.conversation.versions.length === 0) {
            throw new StateError('NoVersions', 'No summary versions yet');
        }
        return session.conversation;
    }

    private versionByNumber(version: SummaryVersion | undefined, versionNumber: number): SummaryVersion {
        if (!version) {
            throw new NavigationError('OutOfRange', `Invalid version number ${versionNumber}`);
        }
        return version;
    }

    private current(session: SummarySession, conversation: SummaryConversation): SummaryVersion {
        const version = session.cursor !== undefined ? conversation.versions.get(session.cursor) : undefined;
        return version ?? this.versionByNumber(conversation.versions.latest(), conversation.currentVersionNumber);
    }

    private navigate(
        sessionId: string,
        move: (conversation: SummaryConversation, cursor: number) => NavigationResult,
    ): SessionView {
        const session = this.require(sessionId);
        const conversation = this.requireConversation(session);
        const result = move(conversation, session.cursor ?? conversation.versions.length - 1);
        session.cursor = result.cursor;
        return this.toView(session);
    }

    private begin(session: SummarySession, kind: PendingCall['kind'], estimatedProcessingMs?: number): PendingCall {
        if (session.pending) {
            throw new StateError('RequestInFlight', `A ${session.pending.kind} is already in progress`);
        }
        const pending: PendingCall = {
            kind,
            phase: 'idle',
            startedAt: new Date(),
            estimatedProcessingMs,
            controller: new AbortController(),
        };
        session.pending = pending;
        return pending;
    }

    private end(session: SummarySession, pending: PendingCall): void {
        if (session.pending === pending) {
            session.pending = undefined;
        }
    }

    private toView(session: SummarySession): SessionView {
        const conversation = session.conversation;
        const versions = conversation?.versions;
        const cursor = session.cursor;
        const pending = session.pending;

        return {
            sessionId: session.sessionId,
            createdAt: session.createdAt,
            conversationId: conversation?.conversationId ?? null,
            document: conversation
                ? {
                    name: conversation.document.name,
                    sizeBytes: conversation.document.sizeBytes,
                    extension: conversation.document.extension,
                    mimeType: conversation.document.mimeType,
                }
                : null,
            config: conversation ? { ...conversation.config } : null,
            versionCount: versions?.length ?? 0,
            cursor: cursor ?? null,
            currentVersion: versions && cursor !== undefined ? versions.get(cursor) ?? null : null,
            canUndo: versions !== undefined && cursor !== undefined && versions.canUndo(cursor),
            canRedo: versions !== undefined && cursor !== undefined && versions.canRedo(cursor),
            hasNavigatedBack: versions !== undefined && cursor !== undefined && versions.hasNavigatedBack(cursor),
            refinementCount: conversation?.refinementCount ?? 0,
            estimatedTokens: conversation?.log.estimateTokens() ?? 0,
            pending: pending
                ? {
                    kind: pending.kind,
                    phase: pending.phase,
                    startedAt: pending.startedAt,
                    estimatedProcessingMs: pending.estimatedProcessingMs,
                }
                : null,
        };
    }
}
