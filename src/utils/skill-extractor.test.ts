import { describe, it, expect } from 'vitest';
import { categorizeSkills, extractCategorizedSkills, extractSkills } from './skill-extractor.js';

describe('extractSkills', () => {
  it('returns vocabulary terms in vocabulary order', () => {
    const skills = extractSkills('We use Python and SQL daily', 'Experience with Docker and JavaScript');
    expect(skills).toEqual(['python', 'javascript', 'sql', 'docker']);
  });

  it('matches multi-word terms and dotted names', () => {
    expect(extractSkills('Machine learning on Node.js services')).toEqual(['node.js', 'machine learning']);
  });

  it('handles missing text', () => {
    expect(extractSkills(null)).toEqual([]);
    expect(extractSkills('', null)).toEqual([]);
  });
});

describe('extractCategorizedSkills', () => {
  const text = 'SQL and Tableau. We love SQL. Strong SQL plus Tableau and Agile.';

  it('ranks skills by how often they are mentioned', () => {
    expect(extractCategorizedSkills(text)).toEqual(['SQL', 'Tableau', 'Agile']);
  });

  it('truncates to maxSkills', () => {
    expect(extractCategorizedSkills(text, 2)).toEqual(['SQL', 'Tableau']);
  });

  it('de-duplicates case-insensitively using the canonical name', () => {
    expect(extractCategorizedSkills('sql, Sql and SQL')).toEqual(['SQL']);
  });

  it('matches terms with symbols', () => {
    expect(extractCategorizedSkills('Modern C++ experience')).toEqual(['C++']);
  });
});

describe('categorizeSkills', () => {
  it('groups known skills and ignores unknown ones', () => {
    expect(categorizeSkills(['SQL', 'Leadership', 'Juggling'])).toEqual({
      technical: ['SQL'],
      leadership: ['Leadership'],
    });
  });
});
