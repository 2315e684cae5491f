import { EntryCollection, EntryCollectionChange, EntryCollectionEvent } from '../src/models/entryCollection';
import { HostsFileEntry } from '../src/models/hostsFileEntry';

function entry(ip: string, host: string, comment: string = ''): HostsFileEntry {
  const created = HostsFileEntry.fromStrings(ip, host, comment);
  if (!created) {
    throw new Error(`invalid test entry ${ip} ${host}`);
  }
  return created;
}

function hostnames(collection: EntryCollection): Array<string | null> {
  return collection.toArray().map(item => item.hostname?.toString() ?? null);
}

describe('EntryCollection', () => {
  let collection: EntryCollection;

  beforeEach(() => {
    collection = new EntryCollection();
  });

  it('should keep insertion order and allow duplicates', () => {
    const first = entry('10.0.0.1', 'one.test');
    collection.add(first);
    collection.add(entry('10.0.0.2', 'two.test'));
    collection.add(first);

    expect(collection.length).toBe(3);
    expect(hostnames(collection)).toEqual(['one.test', 'two.test', 'one.test']);
    expect(collection.get(2)).toBe(first);
  });

  it('should insert at a position and reject out of range indexes', () => {
    collection.add(entry('10.0.0.1', 'one.test'));
    collection.add(entry('10.0.0.3', 'three.test'));
    collection.insert(1, entry('10.0.0.2', 'two.test'));
    collection.insert(3, entry('10.0.0.4', 'four.test'));

    expect(hostnames(collection)).toEqual(['one.test', 'two.test', 'three.test', 'four.test']);
    expect(() => collection.insert(9, entry('10.0.0.9', 'nine.test'))).toThrow(RangeError);
    expect(() => collection.insert(-1, entry('10.0.0.9', 'nine.test'))).toThrow(RangeError);
  });

  it('should remove by identity', () => {
    const a = entry('10.0.0.1', 'same.test');
    const b = entry('10.0.0.1', 'same.test');
    collection.add(a);
    collection.add(b);

    expect(collection.remove(b)).toBe(true);
    expect(collection.length).toBe(1);
    expect(collection.get(0)).toBe(a);
    expect(collection.remove(b)).toBe(false);
  });

  it('should remove by index', () => {
    collection.add(entry('10.0.0.1', 'one.test'));
    collection.add(entry('10.0.0.2', 'two.test'));

    const removed = collection.removeAt(0);
    expect(removed.hostname?.toString()).toBe('one.test');
    expect(hostnames(collection)).toEqual(['two.test']);
    expect(() => collection.removeAt(1)).toThrow('Index 1 is out of range');
  });

  it('should report changes to listeners', () => {
    const changes: EntryCollectionChange[] = [];
    collection.on(EntryCollectionEvent.CHANGED, (change: EntryCollectionChange) => changes.push(change));

    const item = entry('10.0.0.1', 'one.test');
    collection.add(item);
    collection.remove(item);
    collection.clear();

    expect(changes).toEqual([
      { type: 'added', index: 0, entry: item },
      { type: 'removed', index: 0, entry: item },
      { type: 'cleared' },
    ]);
  });

  it('should list only valid entries', () => {
    const broken = entry('10.0.0.2', 'two.test');
    broken.ipAddress = null;
    collection.add(entry('10.0.0.1', 'one.test'));
    collection.add(broken);

    expect(collection.validEntries().map(item => item.hostname?.toString())).toEqual(['one.test']);
    expect([...collection]).toHaveLength(2);
  });

  describe('sort', () => {
    beforeEach(() => {
      collection.add(entry('10.0.0.10', 'charlie.test', 'b'));
      collection.add(entry('::1', 'alpha.test', 'a'));
      collection.add(entry('10.0.0.2', 'bravo.test', 'c'));
    });

    it('should sort addresses numerically', () => {
      collection.sort('ipAddress');
      expect(collection.toArray().map(item => item.ipAddress?.toString())).toEqual(['10.0.0.2', '10.0.0.10', '::1']);
    });

    it('should sort hostnames in either direction', () => {
      collection.sort('hostname');
      expect(hostnames(collection)).toEqual(['alpha.test', 'bravo.test', 'charlie.test']);

      collection.sort('hostname', 'desc');
      expect(hostnames(collection)).toEqual(['charlie.test', 'bravo.test', 'alpha.test']);
    });

    it('should sort comments', () => {
      collection.sort('comment');
      expect(collection.toArray().map(item => item.comment)).toEqual(['a', 'b', 'c']);
    });

    it('should keep unset fields last in both directions', () => {
      const unset = entry('10.0.0.1', 'zulu.test');
      unset.hostname = null;
      collection.add(unset);

      collection.sort('hostname');
      expect(collection.get(3)).toBe(unset);

      collection.sort('hostname', 'desc');
      expect(collection.get(3)).toBe(unset);
    });

    it('should be stable for equal keys', () => {
      const first = entry('10.0.0.20', 'dup.test', 'first');
      const second = entry('10.0.0.21', 'dup.test', 'second');
      collection.add(first);
      collection.add(second);

      collection.sort('hostname');
      expect(collection.toArray().slice(3)).toEqual([first, second]);
    });

    it('should accept a custom comparator', () => {
      collection.sort((a, b) => a.comment.length - b.comment.length || b.comment.localeCompare(a.comment));
      expect(collection.toArray().map(item => item.comment)).toEqual(['c', 'b', 'a']);
    });
  });
});
