import { asPlainValue, fromPlain, nodeEquals, toPlain } from '../composer/document';

describe('document nodes', () => {
  it('should tag every node with the contributing plugin', () => {
    const node = fromPlain({ tables: { User: { columns: [{ name: 'id' }] } } }, 'core');

    expect(toPlain(node, true)).toEqual({
      _plugin: 'core',
      tables: { _plugin: 'core', User: { _plugin: 'core', columns: [{ _plugin: 'core', name: 'id' }] } },
    });
  });

  it('should keep provenance written into the document', () => {
    const node = fromPlain({ User: { _plugin: 'audit', name: 'users' } }, 'core');

    expect(toPlain(node)).toEqual({ User: { name: 'users' } });
    expect(toPlain(node, true)).toEqual({ _plugin: 'core', User: { _plugin: 'audit', name: 'users' } });
  });

  it('should compare structure and ignore provenance', () => {
    expect(nodeEquals(fromPlain({ a: [1, 2] }, 'core'), fromPlain({ a: [1, 2] }, 'audit'))).toBe(true);
    expect(nodeEquals(fromPlain({ a: [1, 2] }, 'core'), fromPlain({ a: [2, 1] }, 'core'))).toBe(false);
    expect(nodeEquals(fromPlain('1', 'core'), fromPlain(1, 'core'))).toBe(false);
  });

  it('should reject values a declaration cannot hold', () => {
    expect(asPlainValue({ a: [1, 'b', null] })).toEqual({ a: [1, 'b', null] });
    expect(() => asPlainValue({ when: undefined })).toThrow('Unsupported value at $.when: undefined');
  });
});
