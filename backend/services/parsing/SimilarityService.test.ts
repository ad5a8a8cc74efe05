import { SimilarityService } from './SimilarityService';

describe('SimilarityService', () => {
  describe('tokenOverlap', () => {
    it('should ignore case and punctuation', () => {
      expect(SimilarityService.tokenOverlap('Define GDP.', 'define gdp')).toBe(1);
    });

    it('should score shared tokens with the Dice coefficient', () => {
      expect(SimilarityService.tokenOverlap('a b c d', 'a b c e')).toBe(0.75);
    });

    it('should treat two empty texts as identical and one empty text as unrelated', () => {
      expect(SimilarityService.tokenOverlap('', '')).toBe(1);
      expect(SimilarityService.tokenOverlap('abc', '')).toBe(0);
    });
  });

  describe('characterDice', () => {
    it('should return 1 for texts equal after normalization', () => {
      expect(SimilarityService.characterDice('Define GDP.', 'define gdp')).toBe(1);
    });

    it('should compare character bigrams', () => {
      expect(SimilarityService.characterDice('night', 'nacht')).toBe(0.25);
    });
  });

  it('should use token overlap unless character dice is requested', () => {
    expect(SimilarityService.calculateSimilarity('a b c d', 'a b c e')).toBe(0.75);
    expect(SimilarityService.calculateSimilarity('night', 'nacht', 'character_dice')).toBe(0.25);
  });
});
