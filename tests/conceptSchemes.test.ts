import { CONCEPT_SCHEMES, listConceptSchemes, resolveConceptSchemes } from '../src/conceptSchemes';
import { UnknownConceptSchemeError } from '../src/errors';

describe('concept scheme registry', () => {
  it('holds every known scheme with a bare id.loc.gov URI', () => {
    expect(CONCEPT_SCHEMES.size).toBe(130);
    for (const uri of CONCEPT_SCHEMES.values()) {
      expect(uri.startsWith('http://id.loc.gov/')).toBe(true);
    }
  });

  it('keeps the table order when listing', () => {
    const schemes = listConceptSchemes();
    expect(schemes[0]).toEqual({ name: 'bibframe-instances', uri: 'http://id.loc.gov/resources/instances' });
    expect(schemes).toHaveLength(130);
  });
});

describe('resolveConceptSchemes', () => {
  it('maps names to URIs in input order', () => {
    expect(resolveConceptSchemes(['name-authority', 'subject-headings'])).toEqual([
      'http://id.loc.gov/authorities/names',
      'http://id.loc.gov/authorities/subjects',
    ]);
  });

  it('resolves every registry name to its own URI', () => {
    for (const [name, uri] of CONCEPT_SCHEMES) {
      expect(resolveConceptSchemes([name])).toEqual([uri]);
    }
  });

  it('keeps duplicates rather than collapsing them', () => {
    expect(resolveConceptSchemes(['genre-form-terms', 'roles', 'genre-form-terms'])).toEqual([
      'http://id.loc.gov/authorities/genreForms',
      'http://id.loc.gov/entities/roles',
      'http://id.loc.gov/authorities/genreForms',
    ]);
  });

  it('returns an empty list for no names', () => {
    expect(resolveConceptSchemes([])).toEqual([]);
  });

  it('reports every unknown name, not just the first', () => {
    let caught: unknown;
    try {
      resolveConceptSchemes(['foo', 'subject-headings', 'bar']);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnknownConceptSchemeError);
    expect(caught).toMatchObject({
      missing: ['foo', 'bar'],
      message: "Concept scheme name(s) don't exist: foo, bar",
    });
  });

  it('resolves against a supplied registry', () => {
    const registry = new Map([['local', 'http://example.org/schemes/local']]);
    expect(resolveConceptSchemes(['local'], registry)).toEqual(['http://example.org/schemes/local']);
    expect(() => resolveConceptSchemes(['subject-headings'], registry)).toThrow(UnknownConceptSchemeError);
  });
});
