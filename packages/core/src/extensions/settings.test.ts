import { describe, it, expect } from 'vitest';
import type { RegistrationRecord } from '@plugstead/shared';
import { ExtensionSettings } from './settings.js';
import { InMemoryRegistrationStore } from './storage.js';

function makeRecord(settings = '{}'): RegistrationRecord {
  return { id: 'acme.reports', name: 'Reports', enabled: true, installed: true, settings };
}

describe('ExtensionSettings', () => {
  it('loads the stored blob on construction', () => {
    const settings = new ExtensionSettings(makeRecord('{"color":"blue","limit":10}'), new InMemoryRegistrationStore());
    expect(settings.get('color')).toBe('blue');
    expect(settings.get('limit')).toBe(10);
    expect(settings.size).toBe(2);
    expect(settings.keys()).toEqual(['color', 'limit']);
  });

  it('starts empty for invalid JSON', () => {
    const settings = new ExtensionSettings(makeRecord('{not json'), new InMemoryRegistrationStore());
    expect(settings.size).toBe(0);
    expect(settings.toJSON()).toEqual({});
  });

  it('starts empty for JSON that is not an object', () => {
    expect(new ExtensionSettings(makeRecord('[1,2]'), new InMemoryRegistrationStore()).size).toBe(0);
    expect(new ExtensionSettings(makeRecord('"text"'), new InMemoryRegistrationStore()).size).toBe(0);
    expect(new ExtensionSettings(makeRecord('null'), new InMemoryRegistrationStore()).size).toBe(0);
  });

  it('falls back to defaults, then to the given fallback', () => {
    const settings = new ExtensionSettings(makeRecord('{"a":1}'), new InMemoryRegistrationStore(), { b: 2 });
    expect(settings.get('a')).toBe(1);
    expect(settings.get('b')).toBe(2);
    expect(settings.get('c', 'fallback')).toBe('fallback');
    expect(settings.get('c')).toBeUndefined();
    expect(settings.has('b')).toBe(false);
  });

  it('keeps writes in memory until save()', async () => {
    const store = new InMemoryRegistrationStore([makeRecord()]);
    const record = makeRecord();
    const settings = new ExtensionSettings(record, store);

    settings.set('color', 'green');
    expect(store.peek('acme.reports')?.settings).toBe('{}');

    await settings.save();
    expect(store.peek('acme.reports')?.settings).toBe('{"color":"green"}');
    expect(record.settings).toBe('{"color":"green"}');
  });

  it('round-trips through save() and a fresh load()', async () => {
    const store = new InMemoryRegistrationStore([makeRecord()]);
    const settings = new ExtensionSettings(makeRecord(), store);
    settings.update({ color: 'red', nested: { depth: 2 }, tags: ['x', 'y'] });
    settings.delete('missing');
    await settings.save();

    const stored = store.peek('acme.reports');
    expect(stored).toBeDefined();
    if (!stored) return;
    const reloaded = new ExtensionSettings(stored, store);
    expect(reloaded.toJSON()).toEqual({ color: 'red', nested: { depth: 2 }, tags: ['x', 'y'] });
  });

  it('load() replaces in-memory values', () => {
    const record = makeRecord('{"a":1}');
    const settings = new ExtensionSettings(record, new InMemoryRegistrationStore());
    settings.set('b', 2);
    record.settings = '{"c":3}';
    settings.load();
    expect(settings.entries()).toEqual([['c', 3]]);
  });

  it('save() replaces the whole blob', async () => {
    const store = new InMemoryRegistrationStore([makeRecord('{"a":1,"b":2}')]);
    const settings = new ExtensionSettings(makeRecord('{"a":1,"b":2}'), store);
    settings.delete('a');
    await settings.save();
    expect(store.peek('acme.reports')?.settings).toBe('{"b":2}');
  });
});
