import { describe, it, expect } from 'vitest';
import {
  averageLength,
  countSentences,
  featureSimilarity,
  jaccard,
  messageMetrics,
  profileSimilarity,
  punctuationDensities,
  structureFeatures,
  tokenize,
  vocabulary,
} from '../../../src/core/text-analysis.js';

describe('text analysis', () => {
  describe('tokenize', () => {
    it('should lowercase and keep contractions', () => {
      expect(tokenize("Don't STOP, now!")).toEqual(["don't", 'stop', 'now']);
    });

    it('should return nothing for punctuation only', () => {
      expect(tokenize('?!...')).toEqual([]);
    });

    it('should keep accented words whole', () => {
      expect(tokenize('Café naïve')).toEqual(['café', 'naïve']);
      expect(tokenize('cafe\u0301')).toEqual(['cafe\u0301']);
    });

    it('should tokenize Cyrillic and CJK text', () => {
      expect(tokenize('Привет, Мир!')).toEqual(['привет', 'мир']);
      expect(tokenize('今日は晴れ。明日は雨')).toEqual(['今日は晴れ', '明日は雨']);
    });

    it('should drop quotes around words', () => {
      expect(tokenize("'quoted' rock'n'roll")).toEqual(['quoted', "rock'n'roll"]);
    });
  });

  describe('jaccard', () => {
    it('should divide shared words by the union', () => {
      expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3, 10);
    });

    it('should be zero for two empty vocabularies', () => {
      expect(jaccard(new Set(), new Set())).toBe(0);
    });

    it('should be zero for unrelated non-Latin messages', () => {
      expect(jaccard(vocabulary(['Привет мир']), vocabulary(['Пока друг']))).toBe(0);
      expect(jaccard(vocabulary(['今日は晴れです。']), vocabulary(['猫が好きです。']))).toBe(0);
    });

    it('should be zero when one side is empty', () => {
      expect(jaccard(vocabulary(['word']), vocabulary(['']))).toBe(0);
    });
  });

  describe('featureSimilarity', () => {
    it('should follow min/max with zero rules', () => {
      expect(featureSimilarity(0, 0)).toBe(1);
      expect(featureSimilarity(0, 2)).toBe(0);
      expect(featureSimilarity(2, 4)).toBe(0.5);
    });

    it('should average over keys', () => {
      expect(profileSimilarity({ x: 1, y: 0 }, { x: 2, y: 3 }, ['x', 'y'])).toBe(0.25);
      expect(profileSimilarity({}, {}, [])).toBe(1);
    });
  });

  describe('countSentences', () => {
    it('should count closed and trailing sentences', () => {
      expect(countSentences('One. Two! Three')).toBe(3);
      expect(countSentences('Wait...')).toBe(1);
      expect(countSentences('   ')).toBe(0);
    });
  });

  describe('structureFeatures', () => {
    it('should describe paragraphs, questions and clauses', () => {
      expect(structureFeatures(['Para one.\n\nPara two?'])).toEqual({
        paragraphs: 2,
        listItems: 0,
        questions: 1,
        codeFences: 0,
        clausesPerSentence: 1,
      });
    });

    it('should count list items', () => {
      expect(structureFeatures(['- a\n- b\n1. c']).listItems).toBe(3);
    });

    it('should average across messages', () => {
      expect(structureFeatures(['Why?', 'Because.']).questions).toBe(0.5);
    });
  });

  describe('punctuationDensities', () => {
    it('should divide counts by total length', () => {
      expect(punctuationDensities(['a,b!'])).toEqual({
        exclamations: 0.25,
        commas: 0.25,
        semicolons: 0,
        colons: 0,
        dashes: 0,
      });
    });

    it('should count em dashes as dashes', () => {
      expect(punctuationDensities(['a—b-']).dashes).toBe(0.5);
    });
  });

  it('should average message lengths', () => {
    expect(averageLength(['ab', 'abcd'])).toBe(3);
    expect(averageLength([])).toBe(0);
  });

  describe('messageMetrics', () => {
    it('should measure one message', () => {
      const metrics = messageMetrics('the the cat?');

      expect(metrics).toMatchObject({
        wordCount: 3,
        charCount: 12,
        sentenceCount: 1,
        vocabularySize: 2,
        selfRepetition: 0.5,
        questionCount: 1,
        averageWordLength: 3,
      });
      expect(metrics.typeTokenRatio).toBeCloseTo(2 / 3, 10);
      expect(metrics.entropy).toBeCloseTo(0.9182958340544896, 10);
    });

    it('should count code points', () => {
      expect(messageMetrics('naïve café')).toMatchObject({ wordCount: 2, charCount: 10, averageWordLength: 5 });
    });

    it('should be all zero for an empty message', () => {
      expect(messageMetrics('')).toEqual({
        wordCount: 0,
        charCount: 0,
        sentenceCount: 0,
        vocabularySize: 0,
        typeTokenRatio: 0,
        entropy: 0,
        selfRepetition: 0,
        questionCount: 0,
        averageWordLength: 0,
      });
    });
  });
});
