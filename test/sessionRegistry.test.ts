import { describe, expect, it } from 'vitest';
import { validate as isUuid, version as uuidVersion } from 'uuid';
import { SessionBusyError, SessionConflictError, SessionNotFoundError } from '../src/errors.js';
import { SessionRegistry } from '../src/registry/sessionRegistry.js';
import { createMemoryStore } from '../src/storage/dataStore.js';
import { FIXED_NOW } from './helpers.js';

const HOUR = 3_600_000;

function createRegistry(now: () => Date = () => FIXED_NOW) {
  const store = createMemoryStore();
  return { store, registry: new SessionRegistry(store, now) };
}

describe('SessionRegistry', () => {
  it('creates processing sessions under fresh v4 ids', async () => {
    const { registry, store } = createRegistry();

    const fileId = await registry.create({ level: 'simple', originalFilename: 'brief.txt' });

    expect(isUuid(fileId)).toBe(true);
    expect(uuidVersion(fileId)).toBe(4);
    expect(await registry.get(fileId)).toEqual({
      fileId,
      status: 'processing',
      metadata: {
        originalFilename: 'brief.txt',
        docType: 'brd',
        level: 'simple',
        createdAt: FIXED_NOW.toISOString(),
      },
      sectionStatuses: [],
    });
    expect(await store.list('sessions')).toEqual([`${fileId}.json`]);
  });

  it('reads records stored without a document type as business requirements', async () => {
    const { registry, store } = createRegistry();
    const fileId = '3f1c2d9e-8b7a-4c6d-9e0f-1a2b3c4d5e6f';
    await store.writeJSON(`sessions/${fileId}.json`, {
      fileId,
      status: 'ready',
      metadata: { level: 'simple', createdAt: FIXED_NOW.toISOString() },
      sectionStatuses: [],
    });

    expect((await registry.require(fileId)).metadata.docType).toBe('brd');
  });

  it('stores the requested document type', async () => {
    const { registry } = createRegistry();

    const fileId = await registry.create({ level: 'simple', docType: 'frd' });

    expect((await registry.require(fileId)).metadata.docType).toBe('frd');
  });

  it('resolves unknown and malformed ids to null', async () => {
    const { registry } = createRegistry();

    expect(await registry.get('3f1c2d9e-8b7a-4c6d-9e0f-1a2b3c4d5e6f')).toBeNull();
    expect(await registry.get('../sessions/secret')).toBeNull();
    expect(await registry.getDocument('not-a-uuid')).toBeNull();
    await expect(registry.require('not-a-uuid')).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(registry.update('not-a-uuid', () => {})).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('applies concurrent updates one after another', async () => {
    const { registry } = createRegistry();
    const fileId = await registry.create({ level: 'intermediate' });

    await Promise.all(
      Array.from({ length: 10 }, (_, index) =>
        registry.update(fileId, (session) => {
          session.sectionStatuses.push({
            id: 'budget',
            title: `update-${index}`,
            status: 'pending',
            retryCount: index,
          });
        }),
      ),
    );

    const session = await registry.require(fileId);
    expect(session.sectionStatuses.map((section) => section.retryCount)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('rejects updates that break the session schema', async () => {
    const { registry } = createRegistry();
    const fileId = await registry.create({ level: 'intermediate' });

    await expect(
      registry.update(fileId, (session) => {
        session.metadata.createdAt = 'yesterday';
      }),
    ).rejects.toThrow();
    expect((await registry.require(fileId)).metadata.createdAt).toBe(FIXED_NOW.toISOString());
  });

  it('allows one generation claim per session', async () => {
    const { registry } = createRegistry();
    const fileId = await registry.create({ level: 'intermediate' });

    await registry.beginGeneration(fileId);
    await expect(registry.beginGeneration(fileId)).rejects.toBeInstanceOf(SessionBusyError);
    expect(registry.isGenerating(fileId)).toBe(true);

    await registry.update(fileId, (session) => {
      session.status = 'ready';
    });
    registry.endGeneration(fileId);

    await expect(registry.beginGeneration(fileId)).rejects.toBeInstanceOf(SessionConflictError);
    expect(registry.isGenerating(fileId)).toBe(false);
  });

  it('deletes sessions older than the ttl together with their documents', async () => {
    let now = new Date('2026-03-01T00:00:00.000Z');
    const { registry, store } = createRegistry(() => now);
    const old = await registry.create({ level: 'intermediate' });
    await store.writeJSON(`documents/${old}.json`, { placeholder: true });

    now = new Date('2026-03-01T20:00:00.000Z');
    const recent = await registry.create({ level: 'intermediate' });

    const removed = await registry.deleteExpired(12 * HOUR, new Date('2026-03-02T02:00:00.000Z'));

    expect(removed).toBe(1);
    expect(await registry.get(old)).toBeNull();
    expect(await store.readJSON(`documents/${old}.json`)).toBeNull();
    expect(await registry.get(recent)).not.toBeNull();
  });

  it('keeps expired sessions that are still generating', async () => {
    const { registry } = createRegistry(() => new Date('2026-01-01T00:00:00.000Z'));
    const fileId = await registry.create({ level: 'intermediate' });
    await registry.beginGeneration(fileId);

    expect(await registry.deleteExpired(HOUR, FIXED_NOW)).toBe(0);
    expect(await registry.get(fileId)).not.toBeNull();
  });

  it('fails sessions left in processing by an earlier run', async () => {
    const { registry } = createRegistry();
    const interrupted = await registry.create({ level: 'intermediate' });
    const finished = await registry.create({ level: 'intermediate' });
    await registry.update(finished, (session) => {
      session.status = 'ready';
    });

    expect(await registry.failInterrupted('Generation was interrupted by a restart')).toBe(1);

    expect(await registry.get(interrupted)).toMatchObject({
      status: 'failed',
      failureReason: 'Generation was interrupted by a restart',
    });
    expect((await registry.get(finished))?.status).toBe('ready');
  });

  it('serves a read after the update queued ahead of it', async () => {
    const { registry } = createRegistry();
    const fileId = await registry.create({ level: 'intermediate' });

    const update = registry.update(fileId, (session) => {
      session.status = 'failed';
      session.failureReason = 'cancelled';
    });
    const read = registry.get(fileId);

    await update;
    expect((await read)?.status).toBe('failed');
  });
});
