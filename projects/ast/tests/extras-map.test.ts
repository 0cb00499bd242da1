import { makeSemicolon, makeWhitespace } from '../builders';
import { MutableExtrasMap } from '../extras-map';
import { int, property } from './ast-util';

describe('MutableExtrasMap', () => {
  it('should return no extras for unknown nodes', () => {
    const extras = new MutableExtrasMap();
    const node = int('1');
    expect(extras.before(node)).toEqual([]);
    expect(extras.within(node)).toEqual([]);
    expect(extras.after(node)).toEqual([]);
    expect(extras.has(node)).toBe(false);
    expect(extras.size).toEqual(0);
  });

  it('should key entries by node identity', () => {
    const extras = new MutableExtrasMap();
    const node = int('1');
    extras.setAfter(node, [makeSemicolon()]);
    expect(extras.after(node)).toEqual([makeSemicolon()]);
    expect(extras.after(int('1'))).toEqual([]);
  });

  it('should copy the lists it is given', () => {
    const extras = new MutableExtrasMap();
    const node = int('1');
    const list = [makeWhitespace(' ')];
    extras.setBefore(node, list);
    list.push(makeWhitespace('\n'));
    expect(extras.before(node)).toEqual([makeWhitespace(' ')]);
  });

  it('should keep positions independent', () => {
    const extras = new MutableExtrasMap();
    const node = property('x');
    extras.setBefore(node, [makeWhitespace(' ')]);
    extras.setWithin(node, [makeWhitespace('\n')]);
    extras.setBefore(node, [makeWhitespace('\t')]);
    expect(extras.before(node)).toEqual([makeWhitespace('\t')]);
    expect(extras.within(node)).toEqual([makeWhitespace('\n')]);
    expect(extras.size).toEqual(1);
  });

  it('should move all extras from one node to another', () => {
    const extras = new MutableExtrasMap();
    const from = int('1');
    const to = int('2');
    extras.setBefore(from, [makeWhitespace(' ')]);
    extras.setAfter(from, [makeSemicolon()]);
    extras.moveExtras(from, to);
    expect(extras.has(from)).toBe(false);
    expect(extras.before(to)).toEqual([makeWhitespace(' ')]);
    expect(extras.after(to)).toEqual([makeSemicolon()]);
  });

  it('should leave the map alone when moving to the same node or from nothing', () => {
    const extras = new MutableExtrasMap();
    const node = int('1');
    extras.setWithin(node, [makeWhitespace(' ')]);
    extras.moveExtras(node, node);
    extras.moveExtras(int('3'), node);
    expect(extras.within(node)).toEqual([makeWhitespace(' ')]);
    expect(extras.size).toEqual(1);
  });

  it('should delete entries', () => {
    const extras = new MutableExtrasMap();
    const node = int('1');
    extras.setBefore(node, [makeWhitespace(' ')]);
    extras.delete(node);
    expect(extras.has(node)).toBe(false);
    expect(extras.size).toEqual(0);
  });
});
