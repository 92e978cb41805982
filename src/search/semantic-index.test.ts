import { describe, it, expect, vi } from 'vitest';
import { IndexEntry } from '../types';
import { InvalidArgument } from '../utils/errors';
import { IndexPersistence, SemanticIndex, retrievalText } from './semantic-index';
import {
  StubEmbeddingProvider,
  deferred,
  failingProvider,
  makeHighlight,
  minutesAfter,
  topicProvider,
} from '../testing/fixtures';

describe('SemanticIndex', () => {
  it('inserts, then skips an unchanged highlight without re-embedding', async () => {
    const provider = topicProvider();
    const index = new SemanticIndex(provider);
    const highlight = makeHighlight({ id: 'h1', title: 'Rugby final', summary: 'A close game.' });

    expect(await index.upsert(highlight)).toBe('inserted');
    expect(await index.upsert(highlight)).toBe('unchanged');
    expect(provider.calls).toEqual(['Rugby final\nA close game.']);
    expect(index.size).toBe(1);
  });

  it('re-embeds when the summary changes', async () => {
    const index = new SemanticIndex(topicProvider());
    const highlight = makeHighlight({ id: 'h1', title: 'Rugby final', summary: 'A close game.' });
    await index.upsert(highlight);

    expect(await index.upsert({ ...highlight, summary: 'Now with cricket.' })).toBe('updated');
    expect(index.get('h1')?.embedding).toEqual([1, 1, 0]);
  });

  it('stores immutable entries', async () => {
    const index = new SemanticIndex(topicProvider());
    await index.upsert(makeHighlight({ id: 'h1', title: 'Rugby' }));

    const entry = index.get('h1');
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry?.embedding)).toBe(true);
  });

  it('treats removing an absent id as a no-op', async () => {
    const index = new SemanticIndex(topicProvider());
    await index.upsert(makeHighlight({ id: 'h1' }));

    await index.remove('missing');
    expect(index.ids()).toEqual(['h1']);

    await index.remove('h1');
    expect(index.size).toBe(0);
  });

  it.each([0, -1, 1.5])('rejects top_k %s', async topK => {
    const index = new SemanticIndex(topicProvider());
    await expect(index.query('rugby', topK)).rejects.toBeInstanceOf(InvalidArgument);
  });

  it('returns nothing from an empty index without embedding the query', async () => {
    const provider = topicProvider();
    const index = new SemanticIndex(provider);

    expect(await index.query('rugby', 3)).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it('ranks by similarity and returns every entry when top_k exceeds the size', async () => {
    const index = new SemanticIndex(topicProvider());
    await index.upsert(makeHighlight({ id: 'cricket', title: 'Cricket test' }));
    await index.upsert(makeHighlight({ id: 'rugby', title: 'Rugby final' }));

    const results = await index.query('who won the rugby', 10);

    expect(results).toEqual([
      { highlightId: 'rugby', score: 1 },
      { highlightId: 'cricket', score: 0 },
    ]);
  });

  it('answers an empty query with the newest entries', async () => {
    const index = new SemanticIndex(topicProvider());
    for (let i = 0; i < 5; i++) {
      await index.upsert(makeHighlight({ id: `h${i}`, createdAt: minutesAfter(i) }));
    }

    const results = await index.query('', 5);

    expect(results.map(r => r.highlightId)).toEqual(['h4', 'h3', 'h2', 'h1', 'h0']);
    expect(results.every(r => r.score === 0)).toBe(true);
  });

  it('prefers the more recent highlight on equal scores', async () => {
    const index = new SemanticIndex(topicProvider());
    await index.upsert(makeHighlight({ id: 'old', title: 'Rugby', createdAt: minutesAfter(0) }));
    await index.upsert(makeHighlight({ id: 'new', title: 'Rugby', createdAt: minutesAfter(60) }));

    const results = await index.query('rugby', 1);

    expect(results).toEqual([{ highlightId: 'new', score: 1 }]);
  });

  it('keeps a lexical-only entry when embedding fails and scores it by term overlap', async () => {
    const index = new SemanticIndex(failingProvider());
    const highlight = makeHighlight({ id: 'h1', title: 'Harbour bridge reopens', summary: 'Traffic flows again.' });

    expect(await index.upsert(highlight)).toBe('degraded');
    expect(index.get('h1')?.embedding).toBeNull();

    const results = await index.query('bridge traffic delays', 1);
    // query terms: bridge, traffic, delays; two of them occur in the entry
    expect(results).toEqual([{ highlightId: 'h1', score: 2 / 3 }]);
  });

  it('drops a write overtaken by a newer upsert of the same id', async () => {
    const slow = deferred<number[]>();
    let call = 0;
    const provider = new StubEmbeddingProvider(() => [1, 0, 0]);
    vi.spyOn(provider, 'embed').mockImplementation(async () => (++call === 1 ? slow.promise : [0, 1, 0]));
    const index = new SemanticIndex(provider);
    const first = makeHighlight({ id: 'h1', summary: 'First version.' });
    const second = makeHighlight({ id: 'h1', summary: 'Second version.' });

    const firstWrite = index.upsert(first);
    expect(await index.upsert(second)).toBe('inserted');
    slow.resolve([1, 0, 0]);

    expect(await firstWrite).toBe('stale');
    expect(index.get('h1')?.textForRetrieval).toBe(retrievalText(second));
    expect(index.get('h1')?.embedding).toEqual([0, 1, 0]);
  });

  it('does not resurrect an entry removed while its upsert was embedding', async () => {
    const slow = deferred<number[]>();
    const provider = new StubEmbeddingProvider(() => [1, 0, 0]);
    vi.spyOn(provider, 'embed').mockImplementation(() => slow.promise);
    const index = new SemanticIndex(provider);

    const write = index.upsert(makeHighlight({ id: 'h1' }));
    await index.remove('h1');
    slow.resolve([1, 0, 0]);

    expect(await write).toBe('stale');
    expect(index.has('h1')).toBe(false);
  });

  it('keeps an identical upsert issued while a removal is still persisting', async () => {
    const deleteStarted = deferred<void>();
    const deletion = deferred<void>();
    const persistence: IndexPersistence = {
      loadAll: async () => [],
      save: async () => undefined,
      delete: () => {
        deleteStarted.resolve();
        return deletion.promise;
      },
    };
    const provider = topicProvider();
    const index = new SemanticIndex(provider, persistence);
    const highlight = makeHighlight({ id: 'h1', title: 'Rugby final' });
    await index.upsert(highlight);

    const removal = index.remove('h1');
    await deleteStarted.promise;
    const rewrite = index.upsert(highlight);
    deletion.resolve();
    await removal;

    expect(await rewrite).toBe('inserted');
    expect(index.has('h1')).toBe(true);
    expect(provider.calls).toEqual(['Rugby final\nSummary text.', 'Rugby final\nSummary text.']);
  });

  it('writes through to persistence and hydrates from it', async () => {
    const saved: IndexEntry[] = [];
    const deleted: string[] = [];
    const persisted: IndexEntry = {
      highlightId: 'stored',
      embedding: [0, 0, 1],
      textForRetrieval: 'Market rally\nShares rose.',
      contentHash: 'hash',
      createdAt: minutesAfter(0),
    };
    const persistence: IndexPersistence = {
      loadAll: async () => [persisted],
      save: async entry => {
        saved.push(entry);
      },
      delete: async id => {
        deleted.push(id);
      },
    };
    const index = new SemanticIndex(topicProvider(), persistence);

    expect(await index.hydrate()).toBe(1);
    expect(await index.query('market news', 1)).toEqual([{ highlightId: 'stored', score: 1 }]);

    await index.upsert(makeHighlight({ id: 'h1', title: 'Rugby' }));
    await index.remove('stored');

    expect(saved.map(e => e.highlightId)).toEqual(['h1']);
    expect(deleted).toEqual(['stored']);
    expect(index.ids()).toEqual(['h1']);
  });
});
