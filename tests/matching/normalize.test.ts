import { foldName, normalizeName, pickPrimaryName, declaredNames } from '../../src/matching/normalize';
import { nameSimilarity, normalizedSimilarity } from '../../src/matching/similarity';
import { DEFAULT_NOISE_WORDS } from '../../src/config';

describe('foldName', () => {
  test('case-folds and strips diacritics and punctuation', () => {
    expect(foldName('  São-Paulo!  ')).toBe('sao paulo');
  });

  test('collapses runs of separators', () => {
    expect(foldName('Ward   No.  32')).toBe('ward no 32');
  });

  test('keeps non-Latin scripts intact', () => {
    expect(foldName('काठमाडौं')).toBe('काठमाडौं');
  });
});

describe('normalizeName', () => {
  test('drops administrative noise words', () => {
    expect(normalizeName('Ward No. 32', DEFAULT_NOISE_WORDS)).toBe('32');
    expect(normalizeName('Kathmandu Metropolitan City', DEFAULT_NOISE_WORDS)).toBe('kathmandu');
    expect(normalizeName('Bagmati Province', DEFAULT_NOISE_WORDS)).toBe('bagmati');
  });

  test('falls back to the folded name when only noise remains', () => {
    expect(normalizeName('Ward', DEFAULT_NOISE_WORDS)).toBe('ward');
  });

  test('noise words are matched after folding', () => {
    expect(normalizeName('Tole Pradhan', ['TOLE'])).toBe('pradhan');
  });

  test('without noise words only folds', () => {
    expect(normalizeName('Ward 32')).toBe('ward 32');
  });
});

describe('pickPrimaryName', () => {
  test('prefers the default locale', () => {
    expect(pickPrimaryName({ ne: 'काठमाडौं', en: 'Kathmandu' }, 'en')).toBe('Kathmandu');
  });

  test('falls back to the first non-blank name', () => {
    expect(pickPrimaryName({ en: '  ', ne: ' काठमाडौं ' }, 'en')).toBe('काठमाडौं');
  });

  test('returns null when every name is blank', () => {
    expect(pickPrimaryName({ en: ' ', ne: '' }, 'en')).toBeNull();
  });
});

describe('declaredNames', () => {
  test('lists distinct trimmed names, primary first', () => {
    expect(declaredNames({ ne: 'काठमाडौं', en: 'Kathmandu', alt: ' Kathmandu ' }, 'Kathmandu')).toEqual([
      'Kathmandu',
      'काठमाडौं',
    ]);
  });
});

describe('similarity', () => {
  test('transliteration variants score high', () => {
    expect(nameSimilarity('Kathmandu', 'Katmandu')).toBe(0.8);
  });

  test('identical normalized names score 1', () => {
    expect(normalizedSimilarity('bagmati', 'bagmati')).toBe(1);
    expect(nameSimilarity('Ward 32', 'Ward No. 32', DEFAULT_NOISE_WORDS)).toBe(1);
  });

  test('numbered units differ by their number alone', () => {
    expect(nameSimilarity('Ward 32', 'Ward 33', DEFAULT_NOISE_WORDS)).toBe(0);
  });

  test('unrelated names score 0', () => {
    expect(nameSimilarity('Gandaki', 'Bagmati')).toBe(0);
  });

  test('partial overlap scores in between', () => {
    expect(nameSimilarity('Naya Road', 'New Road')).toBeCloseTo(6 / 13, 10);
    expect(nameSimilarity('Naya Road', 'Naya Sadak')).toBeCloseTo(8 / 15, 10);
  });
});
