/**
 * State document: the single JSON file holding the credential, template and
 * instance tables.
 *
 * Every load is validated with zod; a hand edit that fails validation is
 * logged and ignored, the previous document stays in force. Writes go to a
 * temp file and are renamed into place. chokidar watches the file and a
 * change is emitted only when the content on disk differs from what this
 * process last wrote or loaded, so the store's own writes never echo back as
 * reloads.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import { StateDocumentError, describeError } from '../common/errors/index.js';
import type { Logger } from '../common/logger.js';
import type { CredentialRecord } from '../common/types/credential.js';
import type { InstanceConfig } from '../common/types/instance.js';
import type { Template } from '../common/types/template.js';
import { credentialId, instanceId, templateId } from '../common/types/ids.js';

/** chokidar stability threshold before triggering a reload (ms). */
const WATCH_STABILITY_THRESHOLD_MS = 150;
const WATCH_POLL_INTERVAL_MS = 50;

const DEFAULT_TEMPLATES_FILE = new URL('../../data/default-templates.json', import.meta.url);

// ─── Schema ────────────────────────────────────────────────────

export const idSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9._:-]+$/, 'ids may only contain letters, digits and . _ : -');

const now = () => new Date().toISOString();

export const featureFlagsSchema = z.object({
  semanticSearch: z.boolean().default(true),
  webSearch: z.boolean().default(false),
  localModel: z.boolean().default(false),
});

const settingsSchema = z.record(z.string(), z.string()).default({});

const lifecycleSchema = z.enum(['stopped', 'starting', 'running', 'stopping', 'error']);

const encryptedPayloadSchema = z.object({
  iv: z.string().regex(/^[0-9a-f]+$/),
  authTag: z.string().regex(/^[0-9a-f]+$/),
  ciphertext: z.string().regex(/^[0-9a-f]*$/),
});

const credentialSchema = z.object({
  credentialId: idSchema.transform(credentialId),
  name: z.string().min(1),
  secret: z.union([z.string().min(1), encryptedPayloadSchema]),
  active: z.boolean().default(true),
  createdAt: z.string().default(now),
});

export const templateSchema = z.object({
  templateId: idSchema.transform(templateId),
  name: z.string().min(1),
  description: z.string().default(''),
  personality: z.string().min(1).nullable().default(null),
  features: featureFlagsSchema.default({}),
  settings: settingsSchema,
  createdAt: z.string().default(now),
  updatedAt: z.string().default(now),
});

const instanceSchema = z.object({
  instanceId: idSchema.transform(instanceId),
  name: z.string().min(1),
  templateId: idSchema.transform(templateId),
  credentialId: idSchema.transform(credentialId),
  personalityOverride: z.string().min(1).nullable().default(null),
  personality: z.string().min(1).nullable().default(null),
  features: featureFlagsSchema.default({}),
  settings: settingsSchema,
  autoStart: z.boolean().default(false),
  desiredState: z.enum(['running', 'stopped']).default('stopped'),
  lastObservedState: lifecycleSchema.default('stopped'),
  createdAt: z.string().default(now),
  updatedAt: z.string().default(now),
});

const documentSchema = z
  .object({
    version: z.literal(1).default(1),
    credentials: z.array(credentialSchema).default([]),
    templates: z.array(templateSchema).default([]),
    instances: z.array(instanceSchema).default([]),
  })
  .superRefine((doc, ctx) => {
    const tables = [
      ['credentials', doc.credentials.map((c) => c.credentialId)],
      ['templates', doc.templates.map((t) => t.templateId)],
      ['instances', doc.instances.map((i) => i.instanceId)],
    ] as const;
    for (const [table, ids] of tables) {
      const seen = new Set<string>();
      ids.forEach((id, index) => {
        if (seen.has(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [table, index], message: `duplicate id ${id}` });
        }
        seen.add(id);
      });
    }
  });

export interface StateDocument {
  version: 1;
  credentials: CredentialRecord[];
  templates: Template[];
  instances: InstanceConfig[];
}

export function parseStateDocument(input: unknown): StateDocument {
  const result = documentSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StateDocumentError(`Invalid state document: ${detail}`);
  }
  return result.data;
}

export function serializeStateDocument(doc: StateDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

/** A fresh document seeded with the built-in templates. */
export async function defaultStateDocument(): Promise<StateDocument> {
  const raw: unknown = JSON.parse(await readFile(DEFAULT_TEMPLATES_FILE, 'utf-8'));
  const templates = z.array(templateSchema).parse(raw);
  return { version: 1, credentials: [], templates, instances: [] };
}

// ─── Store ─────────────────────────────────────────────────────

interface StoreEvents {
  changed: (previous: StateDocument, next: StateDocument) => void;
}

export class StateDocumentStore {
  private doc: StateDocument = { version: 1, credentials: [], templates: [], instances: [] };
  private lastContent: string | null = null;
  private pendingWrites = 0;
  private writeChain: Promise<void> = Promise.resolve();
  private watcher: FSWatcher | null = null;
  private readonly events = new EventEmitter<StoreEvents>();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
    private readonly seed: () => Promise<StateDocument> = defaultStateDocument,
  ) {}

  /**
   * Read the document from disk, writing a seeded default when none exists.
   * Should be called once before anything reads the store.
   */
  async load(): Promise<StateDocument> {
    let text: string | null = null;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) {
        throw new StateDocumentError(`Failed to read ${this.filePath}: ${describeError(err)}`, err);
      }
    }

    if (text === null) {
      await this.commit(await this.seed());
      this.logger.info({ file: this.filePath }, 'Created default state document');
    } else {
      this.doc = parseStateDocument(parseJson(text, this.filePath));
      this.lastContent = text;
      this.logger.info(
        {
          file: this.filePath,
          credentials: this.doc.credentials.length,
          templates: this.doc.templates.length,
          instances: this.doc.instances.length,
        },
        'Loaded state document',
      );
    }

    return this.snapshot();
  }

  /** Deep copy of the current document. Callers may mutate it freely. */
  snapshot(): StateDocument {
    return structuredClone(this.doc);
  }

  /**
   * Apply a mutation and persist it. Updates run one at a time, each against
   * the last committed document. Memory only changes once the file has been
   * replaced: a throwing mutator, a validation failure or a failed write
   * leaves both untouched.
   */
  update(mutator: (draft: StateDocument) => void): Promise<StateDocument> {
    this.pendingWrites++;
    const result = this.writeChain.then(async () => {
      try {
        const draft = this.snapshot();
        mutator(draft);
        await this.commit(parseStateDocument(draft));
        return this.snapshot();
      } finally {
        this.pendingWrites--;
      }
    });
    // The chain must keep going after a failed update; the caller still sees the failure.
    this.writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  onChange(listener: StoreEvents['changed']): () => void {
    this.events.on('changed', listener);
    return () => {
      this.events.off('changed', listener);
    };
  }

  /**
   * Re-read the file and emit `changed` when it differs from what this process
   * knows. Returns whether a change was applied. Invalid content is logged
   * and ignored.
   */
  async reload(): Promise<boolean> {
    await this.writeChain;
    const expected = this.lastContent;

    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      this.logger.warn({ file: this.filePath, err: describeError(err) }, 'State document unreadable, keeping current state');
      return false;
    }

    // A write started while we were reading; its own change event will follow.
    if (this.pendingWrites > 0) return false;
    if (text === expected || text === this.lastContent) return false;

    let next: StateDocument;
    try {
      next = parseStateDocument(parseJson(text, this.filePath));
    } catch (err) {
      this.logger.warn({ file: this.filePath, err: describeError(err) }, 'Ignoring invalid state document edit');
      return false;
    }

    const previous = this.doc;
    this.doc = next;
    this.lastContent = text;
    this.logger.info({ file: this.filePath }, 'State document changed on disk');
    this.events.emit('changed', structuredClone(previous), this.snapshot());
    return true;
  }

  /** Begin watching the file for external edits. */
  watch(): void {
    if (this.watcher) return;
    this.watcher = chokidar.watch(this.filePath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: WATCH_STABILITY_THRESHOLD_MS,
        pollInterval: WATCH_POLL_INTERVAL_MS,
      },
    });

    const onFileEvent = () => {
      this.reload().catch((err: unknown) => {
        this.logger.warn({ err: describeError(err) }, 'State document hot-reload failed');
      });
    };
    this.watcher.on('change', onFileEvent);
    this.watcher.on('add', onFileEvent);
  }

  async close(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    await this.writeChain;
    this.events.removeAllListeners();
  }

  /** Atomically replace the file, then adopt `doc` as the current state. */
  private async commit(doc: StateDocument): Promise<void> {
    const content = serializeStateDocument(doc);
    const tmp = `${this.filePath}.tmp-${process.pid}`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmp, content, 'utf-8');
      await rename(tmp, this.filePath);
    } catch (err) {
      throw new StateDocumentError(`Failed to write ${this.filePath}: ${describeError(err)}`, err);
    }
    this.doc = doc;
    this.lastContent = content;
  }
}

function parseJson(text: string, file: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StateDocumentError(`${file} is not valid JSON: ${describeError(err)}`, err);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
