import { describe, it, expect } from 'vitest';
import { validateKeyword, checkKeywordCollision } from '../../src/categorizer/validate.js';

describe('validateKeyword', () => {
    it('accepts a phrase with known categories', () => {
        const result = validateKeyword('dunzo', ['online_food', 'Food']);
        expect(result.valid).toBe(true);
        expect(result.errors).toEqual([]);
        expect(result.categories).toEqual(['online_food', 'food']);
    });

    it('rejects empty phrases', () => {
        const result = validateKeyword('   ', ['food']);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['Phrase cannot be empty']);
    });

    it('rejects phrases shorter than the minimum', () => {
        const result = validateKeyword('ab', ['food']);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['Phrase must be at least 3 characters (got 2)']);
    });

    it('rejects unknown categories', () => {
        const result = validateKeyword('dunzo', ['food', 'gadgets']);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['Unknown category: "gadgets"']);
        expect(result.categories).toEqual(['food']);
    });

    it('requires at least one category', () => {
        const result = validateKeyword('dunzo', []);
        expect(result.errors).toEqual(['At least one category is required']);
    });
});

describe('checkKeywordCollision', () => {
    it('flags phrases that contain or are contained by existing ones', () => {
        const result = checkKeywordCollision('Coffee Shop', ['coffee', 'tea', 'shop']);
        expect(result.hasCollision).toBe(true);
        expect(result.collidingPhrases).toEqual(['coffee', 'shop']);
    });

    it('flags a shorter phrase inside an existing one', () => {
        const result = checkKeywordCollision('bus', ['airbus tickets']);
        expect(result.collidingPhrases).toEqual(['airbus tickets']);
    });

    it('reports no collision for unrelated phrases', () => {
        const result = checkKeywordCollision('zomato', ['swiggy', 'blinkit']);
        expect(result).toEqual({ hasCollision: false, collidingPhrases: [] });
    });
});
