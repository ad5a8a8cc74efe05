import * as stringSimilarity from 'string-similarity';
import type { SimilarityMethod } from '../../config/parsingConfig.js';
import { normalizeTextForComparison, tokenize } from '../../utils/TextNormalizationUtils.js';

export class SimilarityService {

    /**
     * Token-overlap similarity: Dice coefficient over the two token sets.
     * 2·|A∩B| / (|A| + |B|), 1.0 for two empty texts.
     */
    public static tokenOverlap(str1: string, str2: string): number {
        const tokens1 = new Set(tokenize(str1));
        const tokens2 = new Set(tokenize(str2));

        if (tokens1.size === 0 && tokens2.size === 0) return 1.0;
        if (tokens1.size === 0 || tokens2.size === 0) return 0;

        let shared = 0;
        for (const token of tokens1) {
            if (tokens2.has(token)) shared++;
        }
        return (2 * shared) / (tokens1.size + tokens2.size);
    }

    /**
     * Character-bigram Dice similarity on punctuation- and space-free text
     */
    public static characterDice(str1: string, str2: string): number {
        const norm1 = normalizeTextForComparison(str1);
        const norm2 = normalizeTextForComparison(str2);

        if (norm1 === norm2) return 1.0;
        return stringSimilarity.compareTwoStrings(norm1, norm2);
    }

    public static calculateSimilarity(str1: string, str2: string, method: SimilarityMethod = 'token_overlap'): number {
        return method === 'character_dice'
            ? this.characterDice(str1, str2)
            : this.tokenOverlap(str1, str2);
    }
}
