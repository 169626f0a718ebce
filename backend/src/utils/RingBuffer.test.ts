import { describe, expect, it } from 'vitest';
import { RingBuffer } from './RingBuffer';

describe('RingBuffer', () => {
    it('should keep items oldest first until full', () => {
        const buffer = new RingBuffer<number>(3);
        buffer.push(1);
        buffer.push(2);

        expect(buffer.size).toBe(2);
        expect(buffer.toArray()).toEqual([1, 2]);
        expect(buffer.last()).toBe(2);
    });

    it('should evict the oldest entry once full', () => {
        const buffer = new RingBuffer<number>(3);
        for (let i = 1; i <= 5; i++) buffer.push(i);

        expect(buffer.size).toBe(3);
        expect(buffer.toArray()).toEqual([3, 4, 5]);
        expect(buffer.last()).toBe(5);
    });

    it('should reset on clear', () => {
        const buffer = new RingBuffer<string>(2);
        buffer.push('a');
        buffer.clear();

        expect(buffer.size).toBe(0);
        expect(buffer.last()).toBeUndefined();
        buffer.push('b');
        expect(buffer.toArray()).toEqual(['b']);
    });

    it('should reject a non-positive capacity', () => {
        expect(() => new RingBuffer(0)).toThrow(RangeError);
        expect(() => new RingBuffer(1.5)).toThrow(RangeError);
    });
});
