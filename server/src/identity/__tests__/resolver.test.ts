import { describe, expect, it } from 'vitest';
import { IdentityGallery, type GalleryRecord } from '../gallery.js';
import {
  describeIdentities,
  IdentityResolver,
  phraseIdentity,
  UNKNOWN_PERSON,
  type IdentityResolverOptions
} from '../resolver.js';
import { silentLogger, StaticGallerySource } from '../../testing/fakes.js';

const ASHA = [0.1, 0.2, 0.3, 0.4];

async function resolverFor(records: GalleryRecord[], options: IdentityResolverOptions = {}) {
  const gallery = new IdentityGallery(new StaticGallerySource(records), silentLogger());
  await gallery.load();
  return new IdentityResolver(gallery, options);
}

describe('IdentityResolver', () => {
  it('announces a known face once per cooldown window', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    const face = { embedding: ASHA };

    const first = resolver.resolve([face], 0);
    expect(first.facts.map((fact) => fact.text)).toEqual(['your sister Asha']);
    expect(first.facts[0]?.tier).toBe('medium');

    const second = resolver.resolve([face], 2000);
    expect(second.facts).toEqual([]);
    expect(second.suppressed).toEqual(['Asha']);
    expect(describeIdentities(second)).toBe('No one new since my last announcement.');

    const third = resolver.resolve([face], 6000);
    expect(third.facts.map((fact) => fact.text)).toEqual(['your sister Asha']);
    expect(resolver.lastAnnouncedAt('Asha')).toBe(6000);
  });

  it('allows a name again exactly when the cooldown has elapsed', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    resolver.resolve([{ embedding: ASHA }], 1000);
    expect(resolver.resolve([{ embedding: ASHA }], 6000).facts).toHaveLength(1);
  });

  it('leaves the cooldown untouched until assessed facts are committed', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    const face = { embedding: ASHA };

    const assessed = resolver.assess([face], 0);
    expect(assessed.facts.map((fact) => fact.text)).toEqual(['your sister Asha']);
    expect(resolver.lastAnnouncedAt('Asha')).toBeUndefined();
    expect(resolver.assess([face], 100).facts).toHaveLength(1);

    resolver.commit(assessed.facts, 100);
    expect(resolver.lastAnnouncedAt('Asha')).toBe(100);
    expect(resolver.assess([face], 200).suppressed).toEqual(['Asha']);
  });

  it('names a person once when they match two faces in one frame', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    const result = resolver.resolve([{ embedding: ASHA }, { embedding: ASHA }], 0);
    expect(result.facts.map((fact) => fact.text)).toEqual(['your sister Asha']);
    expect(result.suppressed).toEqual(['Asha']);
  });

  it('never throttles unknown faces', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    const stranger = { embedding: [1, 1, 1, 1] };

    for (const now of [0, 100, 200]) {
      const result = resolver.resolve([stranger], now);
      expect(result.facts).toHaveLength(1);
      expect(result.facts[0]?.text).toBe(UNKNOWN_PERSON);
      expect(result.facts[0]?.tier).toBe('high');
      expect(result.facts[0]?.name).toBeNull();
    }
  });

  it('accepts a match at exactly the threshold and rejects beyond it', async () => {
    const resolver = await resolverFor([{ name: 'Kim', embeddings: [[0, 0]] }], { threshold: 0.5 });
    expect(resolver.match([0.5, 0])?.identity.name).toBe('Kim');
    expect(resolver.match([0.75, 0])).toBeNull();
  });

  it('resolves ties to the first gallery entry', async () => {
    const resolver = await resolverFor(
      [
        { name: 'Asha', embeddings: [[1, 0]] },
        { name: 'Bea', embeddings: [[-1, 0]] }
      ],
      { threshold: 1.5 }
    );
    expect(resolver.match([0, 0])?.identity.name).toBe('Asha');
  });

  it('skips gallery embeddings of another dimension', async () => {
    const resolver = await resolverFor([{ name: 'Asha', embeddings: [[0, 0, 0]] }]);
    expect(resolver.match([0, 0])).toBeNull();
  });

  it('reports every face as unknown with an empty gallery', async () => {
    const resolver = await resolverFor([]);
    const result = resolver.resolve([{ embedding: ASHA }, { embedding: [0, 0, 0, 0] }], 0);
    expect(result.facts.map((fact) => fact.name)).toEqual([null, null]);
    expect(describeIdentities(result)).toBe("I see 2 people I don't recognize");
  });
});

describe('phrasing', () => {
  it('puts close relations before the name and others after it', () => {
    expect(phraseIdentity('Asha', 'Sister')).toBe('your sister Asha');
    expect(phraseIdentity('Ravi', 'friend')).toBe('Ravi, your friend');
    expect(phraseIdentity('Kim', null)).toBe('Kim');
  });

  it('mentions known people before strangers', async () => {
    const resolver = await resolverFor([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]);
    const result = resolver.resolve([{ embedding: [1, 1, 1, 1] }, { embedding: ASHA }], 0);
    expect(describeIdentities(result)).toBe("I see your sister Asha and someone I don't recognize");
  });

  it('says so when no face is in view', () => {
    expect(describeIdentities({ facts: [], suppressed: [] })).toBe("I don't see any faces right now.");
  });
});
