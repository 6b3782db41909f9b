import { describe, expect, it } from 'vitest';
import { LiveResultCache, normalizeQuery } from '../../src/services/result-cache.js';
import { liveResult } from '../harness/scripted-agents.js';

describe('normalizeQuery', () => {
    it('trims, lowercases and collapses whitespace', () => {
        expect(normalizeQuery('  Imatinib   Mesylate ')).toBe('imatinib mesylate');
    });
});

describe('LiveResultCache', () => {
    it('replays a remembered live result as CACHED for an equivalent query', () => {
        const cache = new LiveResultCache({ maxAgeMs: 1_000 });
        cache.remember('market', 'Imatinib', liveResult('market', 'Market size: $2.1B.'));

        const recalled = cache.recall('market', '  imatinib ');

        expect(recalled).toMatchObject({
            agent: 'market',
            source: 'CACHED',
            confidence: 'medium',
            insights: 'Market size: $2.1B.',
        });
        expect(cache.recall('patent', 'imatinib')).toBeUndefined();
    });

    it('drops entries older than the max age', () => {
        let now = 0;
        const cache = new LiveResultCache({ maxAgeMs: 1_000, now: () => now });
        cache.remember('clinical', 'metformin', liveResult('clinical'));

        now = 1_000;
        expect(cache.recall('clinical', 'metformin')).toBeDefined();

        now = 1_001;
        expect(cache.recall('clinical', 'metformin')).toBeUndefined();
        expect(cache.size).toBe(0);
    });

    it('evicts the oldest entry beyond capacity', () => {
        const cache = new LiveResultCache({ maxAgeMs: 1_000, maxEntries: 2 });
        cache.remember('market', 'a', liveResult('market'));
        cache.remember('market', 'b', liveResult('market'));
        cache.remember('market', 'c', liveResult('market'));

        expect(cache.size).toBe(2);
        expect(cache.recall('market', 'a')).toBeUndefined();
        expect(cache.recall('market', 'c')).toBeDefined();
    });

    it('stores a copy so later mutation of the original has no effect', () => {
        const cache = new LiveResultCache({ maxAgeMs: 1_000 });
        const original = liveResult('web', 'original');
        cache.remember('web', 'q', original);
        original.insights = 'mutated';

        expect(cache.recall('web', 'q')?.insights).toBe('original');
    });
});
