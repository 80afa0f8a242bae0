import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ConversationLog } from './conversation-log';
import { StateError, ValidationError } from './errors';
import { VersionStore } from './version-store';
import {
  ConversationMessage,
  DocumentMetadata,
  SUMMARY_SIZES,
  SummaryConfig,
  SummaryVersion,
} from './types';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform(value => new Date(value));

export const serializedConversationSchema = z.object({
  conversationId: z.string().min(1),
  documentMetadata: z.object({
    documentId: z.string().min(1),
    name: z.string().min(1),
    sizeBytes: z.number().int().nonnegative(),
    extension: z.string(),
    mimeType: z.string().min(1),
    selectedAt: isoDate,
  }),
  messages: z.array(
    z.object({
      role: z.enum(['user', 'model']),
      content: z.string(),
      timestamp: isoDate,
      attachmentRef: z.string().optional(),
    }),
  ),
  versions: z.array(
    z.object({
      content: z.string(),
      timestamp: isoDate,
      refinementPrompt: z.string().nullable().optional(),
      versionNumber: z.number().int().positive(),
    }),
  ),
  config: z.object({
    size: z.enum(SUMMARY_SIZES),
    customPrompt: z.string().optional(),
  }),
  createdAt: isoDate,
});

export type SerializedConversation = z.input<typeof serializedConversationSchema>;

/**
 * Session state for one document: its config, the message history and the
 * summary versions. Messages and versions only grow, and only together.
 */
export class SummaryConversation {
  readonly log: ConversationLog;
  readonly versions: VersionStore;

  private constructor(
    readonly conversationId: string,
    readonly document: DocumentMetadata,
    readonly config: SummaryConfig,
    readonly createdAt: Date,
    messages: readonly ConversationMessage[] = [],
    versions: readonly SummaryVersion[] = [],
  ) {
    if (messages.length !== versions.length * 2) {
      throw new StateError('MalformedExchange', 'Each version needs exactly one user/model message pair');
    }
    this.log = new ConversationLog();
    this.versions = new VersionStore();
    versions.forEach((version, i) => this.commitExchange(messages[2 * i], messages[2 * i + 1], version));
  }

  static create(document: DocumentMetadata, config: SummaryConfig): SummaryConversation {
    return new SummaryConversation(uuidv4(), document, { ...config }, new Date());
  }

  get messages(): readonly ConversationMessage[] {
    return this.log.messages;
  }

  get currentVersionNumber(): number {
    return this.versions.latest()?.versionNumber ?? 0;
  }

  get refinementCount(): number {
    return Math.max(0, this.versions.length - 1);
  }

  /**
   * Appends the message pair and the version together. Every precondition is
   * checked before either collection is touched.
   */
  commitExchange(userMsg: ConversationMessage, modelMsg: ConversationMessage, version: SummaryVersion): void {
    if (version.versionNumber !== this.versions.nextVersionNumber) {
      throw new StateError(
        'VersionGap',
        `Expected version ${this.versions.nextVersionNumber}, got ${version.versionNumber}`,
      );
    }
    if (userMsg.role !== 'user' || modelMsg.role !== 'model') {
      throw new StateError('MalformedExchange', 'Messages must be appended as a user/model pair');
    }
    if ((version.versionNumber === 1) !== (version.refinementPrompt === null)) {
      throw new StateError('MalformedExchange', 'Only the first version may lack a refinement prompt');
    }
    this.log.appendExchange(userMsg, modelMsg);
    this.versions.append(version);
  }

  toJSON(): SerializedConversation {
    const { document } = this;
    return {
      conversationId: this.conversationId,
      documentMetadata: {
        documentId: document.documentId,
        name: document.name,
        sizeBytes: document.sizeBytes,
        extension: document.extension,
        mimeType: document.mimeType,
        selectedAt: document.selectedAt.toISOString(),
      },
      messages: this.messages.map(m => ({
        role: m.role,
        content: m.content,
        timestamp: m.createdAt.toISOString(),
        ...(m.attachmentRef !== undefined ? { attachmentRef: m.attachmentRef } : {}),
      })),
      versions: this.versions.versions.map(v => ({
        content: v.content,
        timestamp: v.createdAt.toISOString(),
        refinementPrompt: v.refinementPrompt,
        versionNumber: v.versionNumber,
      })),
      config: {
        size: this.config.size,
        ...(this.config.customPrompt !== undefined ? { customPrompt: this.config.customPrompt } : {}),
      },
      createdAt: this.createdAt.toISOString(),
    };
  }

  static fromJSON(input: unknown): SummaryConversation {
    const parsed = serializedConversationSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        'InvalidConversation',
        `Invalid conversation: ${issue.path.join('.') || '(root)'} ${issue.message}`,
      );
    }
    const data = parsed.data;

    const messages: ConversationMessage[] = data.messages.map(m => ({
      role: m.role,
      content: m.content,
      createdAt: m.timestamp,
      ...(m.attachmentRef !== undefined ? { attachmentRef: m.attachmentRef } : {}),
    }));
    const versions: SummaryVersion[] = data.versions.map(v => ({
      content: v.content,
      createdAt: v.timestamp,
      refinementPrompt: v.refinementPrompt ?? null,
      versionNumber: v.versionNumber,
    }));

    try {
      return new SummaryConversation(
        data.conversationId,
        data.documentMetadata,
        data.config,
        data.createdAt,
        messages,
        versions,
      );
    } catch (error) {
      if (error instanceof StateError) {
        throw new ValidationError('InvalidConversation', `Invalid conversation: ${error.message}`);
      }
      throw error;
    }
  }
}
