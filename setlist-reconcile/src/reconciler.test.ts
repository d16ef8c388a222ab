import { describe, it, expect, vi } from 'vitest';
import { reconcile, summarizeResults } from './reconciler.js';
import { flattenSetlists } from './ingest/tour-data.js';
import type { TourData } from './ingest/tour-data.js';
import { LLMMatcher } from './llm/fuzzy-matcher.js';
import type { LLMProvider } from './llm/provider.js';
import type { CompletionRequest } from './llm/types.js';
import type { CatalogEntry, Track } from './matching/types.js';
import { logger } from './utils/logger.js';

/** Answers like a well-behaved model, keyed on the track named in the prompt */
class ScriptedProvider implements LLMProvider {
  name = 'scripted';
  requests: CompletionRequest[] = [];

  constructor(private answers: Record<string, Array<{ catalog_id: string; confidence: string }>>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const trackName = /SETLIST TRACK: "(.*)"/.exec(request.userPrompt)?.[1] ?? '';
    const matches = this.answers[trackName] ?? [{ catalog_id: 'None', confidence: 'None' }];
    return JSON.stringify({ matches });
  }
}

class FailingProvider implements LLMProvider {
  name = 'failing';
  calls = 0;

  async complete(): Promise<string> {
    this.calls++;
    throw new Error('connection refused');
  }
}

function makeEntry(catalogId: string, title: string): CatalogEntry {
  return { catalogId, title, writers: 'Test Writer', controlledPercentage: '100' };
}

function makeTrack(setlistTrackName: string, showDate = '2024-05-10'): Track {
  return { showDate, venueName: 'The Fillmore', city: 'San Francisco', setlistTrackName };
}

function makeMatcher(provider: LLMProvider): LLMMatcher {
  return new LLMMatcher({
    provider,
    settings: {
      model: 'test-model',
      temperature: 0,
      maxRetries: 2,
      backoffBase: 2,
      backoffMax: 30,
      rateLimitDelayMs: 0
    },
    sleep: async () => {}
  });
}

const catalog: CatalogEntry[] = [
  makeEntry('CAT-001', 'Neon Dreams'),
  makeEntry('CAT-002', 'Midnight in Tokyo'),
  makeEntry('CAT-004', 'Desert Rain'),
  makeEntry('CAT-005', 'Ocean Avenue')
];

const answers = {
  'Tokyo (Acoustic)': [{ catalog_id: 'CAT-002', confidence: 'High' }],
  'Desert Rain / Ocean Avenue': [
    { catalog_id: 'CAT-004', confidence: 'High' },
    { catalog_id: 'CAT-005', confidence: 'High' }
  ]
};

describe('reconcile', () => {
  it('logs a summary that counts cached track names', async () => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => {});
    const tracks = [makeTrack('Neon Dreams'), makeTrack('Tokyo (Acoustic)'), makeTrack('Tokyo (Live)')];

    await reconcile(tracks, catalog, makeMatcher(new ScriptedProvider(answers)));

    expect(info).toHaveBeenCalledWith('Match summary: deterministic=1, llm_calls=2, cached_names=1, total_rows=3');
    info.mockRestore();
  });

  it('runs both stages over a two-show tour', async () => {
    const tour: TourData = {
      data: {
        shows: [
          { date: '2024-05-10', venue: 'The Fillmore', city: 'San Francisco', setlist: ['Neon Dreams', 'Tokyo (Acoustic)'] },
          { date: '2024-05-12', venue: 'Crystal Ballroom', city: 'Portland', setlist: ['Desert Rain / Ocean Avenue'] }
        ]
      }
    };
    const provider = new ScriptedProvider(answers);

    const rows = await reconcile(flattenSetlists(tour), catalog, makeMatcher(provider));

    expect(rows).toEqual([
      {
        showDate: '2024-05-10',
        venueName: 'The Fillmore',
        setlistTrackName: 'Neon Dreams',
        matchedCatalogId: 'CAT-001',
        matchedCatalogTitle: 'Neon Dreams',
        matchConfidence: 'Exact'
      },
      {
        showDate: '2024-05-10',
        venueName: 'The Fillmore',
        setlistTrackName: 'Tokyo (Acoustic)',
        matchedCatalogId: 'CAT-002',
        matchedCatalogTitle: 'Midnight in Tokyo',
        matchConfidence: 'High'
      },
      {
        showDate: '2024-05-12',
        venueName: 'Crystal Ballroom',
        setlistTrackName: 'Desert Rain / Ocean Avenue',
        matchedCatalogId: 'CAT-004',
        matchedCatalogTitle: 'Desert Rain',
        matchConfidence: 'High'
      },
      {
        showDate: '2024-05-12',
        venueName: 'Crystal Ballroom',
        setlistTrackName: 'Desert Rain / Ocean Avenue',
        matchedCatalogId: 'CAT-005',
        matchedCatalogTitle: 'Ocean Avenue',
        matchConfidence: 'High'
      }
    ]);
    // Neon Dreams resolved deterministically
    expect(provider.requests).toHaveLength(2);
  });

  it('sends medleys to the LLM even when a catalog title matches exactly', async () => {
    const medleyCatalog = [...catalog, makeEntry('CAT-010', 'Desert Rain / Ocean Avenue')];
    const provider = new ScriptedProvider(answers);

    const rows = await reconcile([makeTrack('Desert Rain / Ocean Avenue')], medleyCatalog, makeMatcher(provider));

    expect(rows.map((row) => row.matchedCatalogId)).toEqual(['CAT-004', 'CAT-005']);
    expect(provider.requests).toHaveLength(1);
  });

  it('emits a single no-match row per unresolved track without a matcher', async () => {
    const rows = await reconcile(
      [makeTrack('Neon Dreams'), makeTrack('Tokyo (Acoustic)'), makeTrack('Desert Rain / Ocean Avenue')],
      catalog
    );

    expect(rows.map((row) => [row.setlistTrackName, row.matchedCatalogId, row.matchedCatalogTitle, row.matchConfidence])).toEqual([
      ['Neon Dreams', 'CAT-001', 'Neon Dreams', 'Exact'],
      ['Tokyo (Acoustic)', null, '', 'None'],
      ['Desert Rain / Ocean Avenue', null, '', 'None']
    ]);
  });

  it('yields exactly one no-match row when the LLM keeps failing', async () => {
    const provider = new FailingProvider();

    const rows = await reconcile([makeTrack('Bhemn Rhpsdy')], catalog, makeMatcher(provider));

    expect(rows).toEqual([
      {
        showDate: '2024-05-10',
        venueName: 'The Fillmore',
        setlistTrackName: 'Bhemn Rhpsdy',
        matchedCatalogId: null,
        matchedCatalogTitle: '',
        matchConfidence: 'None'
      }
    ]);
    expect(provider.calls).toBe(3);
  });

  it('keeps input order and reuses cached LLM results across shows', async () => {
    const provider = new ScriptedProvider(answers);
    const tracks = [
      makeTrack('Tokyo (Acoustic)', '2024-05-10'),
      makeTrack('Neon Dreams', '2024-05-10'),
      makeTrack('Tokyo (Acoustic)', '2024-05-12')
    ];

    const rows = await reconcile(tracks, catalog, makeMatcher(provider));

    expect(rows.map((row) => [row.showDate, row.matchedCatalogId])).toEqual([
      ['2024-05-10', 'CAT-002'],
      ['2024-05-10', 'CAT-001'],
      ['2024-05-12', 'CAT-002']
    ]);
    expect(provider.requests).toHaveLength(1);
  });

  it('flags covers as not controlled', async () => {
    const provider = new ScriptedProvider({ Wonderwall: [{ catalog_id: 'None', confidence: 'None' }] });

    const rows = await reconcile([makeTrack('Wonderwall')], catalog, makeMatcher(provider));

    expect(rows).toHaveLength(1);
    expect(rows[0].matchedCatalogId).toBeNull();
    expect(rows[0].matchConfidence).toBe('None');
  });

  it('returns no rows for no tracks', async () => {
    await expect(reconcile([], catalog)).resolves.toEqual([]);
  });
});

describe('summarizeResults', () => {
  it('counts rows per confidence', async () => {
    const provider = new ScriptedProvider(answers);
    const rows = await reconcile(
      [makeTrack('Neon Dreams'), makeTrack('Tokyo (Acoustic)'), makeTrack('Desert Rain / Ocean Avenue'), makeTrack('Wonderwall')],
      catalog,
      makeMatcher(provider)
    );

    expect(summarizeResults(rows)).toEqual({ Exact: 1, High: 3, Review: 0, None: 1 });
  });
});
