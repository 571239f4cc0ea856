import { StringList } from '../src/string-list.js';

describe('StringList', () => {
    test('is empty until setValue runs', () => {
        const list = new StringList('a,b');
        expect(list.value()).toEqual([]);
        expect(list.get()).toBe('a,b');
    });

    test('splits and trims the raw text', () => {
        const list = new StringList();
        list.set('a, b ,c');
        list.setValue();
        expect(list.value()).toEqual(['a', 'b', 'c']);
    });

    test('reflects the raw text captured at setValue', () => {
        const list = new StringList('x,y');
        list.setValue();
        list.set('z');
        expect(list.value()).toEqual(['x', 'y']);
        list.setValue();
        expect(list.value()).toEqual(['z']);
    });

    test('empty raw text keeps the previous items', () => {
        const list = new StringList('a,b');
        list.setValue();
        list.set('');
        list.setValue();
        expect(list.value()).toEqual(['a', 'b']);
        expect(list.get()).toBe('');
    });

    test('clear drops the items but keeps the raw text', () => {
        const list = new StringList('a,b');
        list.setValue();
        list.clear();
        expect(list.value()).toEqual([]);
        expect(list.get()).toBe('a,b');
    });

    test('value returns a copy', () => {
        const list = new StringList('a');
        list.setValue();
        list.value().push('b');
        expect(list.value()).toEqual(['a']);
    });
});
