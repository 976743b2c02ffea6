import { describe, it, expect, vi } from 'vitest';
import type { QueryToken } from '@spurn/shared/src/types/query.types.js';
import type { DescriptionLookup } from './description-lookup.js';
import { buildNameRegistry } from './name-registry.js';

function person(...names: string[]): QueryToken {
  return { kind: 'person', text: names[0] ?? '', names: names.map((name) => ({ name })) };
}

function entity(text: string): QueryToken {
  return { kind: 'entity', text };
}

function lookupOf(titles: Record<string, string>, definitions: Record<string, string> = {}): DescriptionLookup {
  return {
    personTitle: (name) => Promise.resolve(titles[name] ?? ''),
    entityDefinition: (name) => Promise.resolve(definitions[name] ?? ''),
  };
}

describe('buildNameRegistry', () => {
  it('should register persons with their titles', async () => {
    const registry = await buildNameRegistry(
      [person('Katrín Jakobsdóttir'), person('Jón Jónsson')],
      lookupOf({ 'Katrín Jakobsdóttir': 'forsætisráðherra' }),
    );

    expect(Object.fromEntries(registry)).toEqual({
      'Katrín Jakobsdóttir': { kind: 'name', title: 'forsætisráðherra' },
    });
  });

  it('should keep untitled names only when asked for all names', async () => {
    const registry = await buildNameRegistry(
      [person('Jón Jónsson'), entity('Blörp')],
      lookupOf({}),
      { allNames: true },
    );

    expect(Object.fromEntries(registry)).toEqual({
      'Jón Jónsson': { kind: 'name', title: null },
      Blörp: { kind: 'entity', title: null },
    });
  });

  it('should refer a last name back to the full name', async () => {
    const registry = await buildNameRegistry(
      [person('Hillary Rodham Clinton'), entity('Clinton')],
      lookupOf({ 'Hillary Rodham Clinton': 'utanríkisráðherra' }),
    );

    expect(registry.get('Clinton')).toEqual({ kind: 'ref', fullname: 'Hillary Rodham Clinton' });
  });

  it('should refer a possessive last name back to the full name', async () => {
    const registry = await buildNameRegistry(
      [person('Frank-Walter Steinmeier'), entity('Steinmeiers')],
      lookupOf({ 'Frank-Walter Steinmeier': 'forseti Þýskalands' }),
    );

    expect(registry.get('Steinmeiers')).toEqual({ kind: 'ref', fullname: 'Frank-Walter Steinmeier' });
  });

  it('should describe entities that are not last names', async () => {
    const registry = await buildNameRegistry(
      [person('Hillary Rodham Clinton'), entity('Alþingi'), entity('Sameinuðu þjóðirnar')],
      lookupOf(
        { 'Hillary Rodham Clinton': 'utanríkisráðherra' },
        { Alþingi: 'löggjafarþing Íslendinga', 'Sameinuðu þjóðirnar': 'alþjóðastofnun' },
      ),
    );

    expect(registry.get('Alþingi')).toEqual({ kind: 'entity', title: 'löggjafarþing Íslendinga' });
    expect(registry.get('Sameinuðu þjóðirnar')).toEqual({ kind: 'entity', title: 'alþjóðastofnun' });
  });

  it('should merge spellings of one person under the most specific name', async () => {
    const registry = await buildNameRegistry(
      [person('Dagur Eggertsson'), person('Dagur B. Eggertsson'), person('Dagur Eggertsson')],
      lookupOf({
        'Dagur Eggertsson': 'borgarstjóri',
        'Dagur B. Eggertsson': 'borgarstjóri Reykjavíkur',
      }),
    );

    // The last mention's title wins, stored under the merged key
    expect(Object.fromEntries(registry)).toEqual({
      'Dagur B. Eggertsson': { kind: 'name', title: 'borgarstjóri' },
    });
  });

  it('should move refs along when their full name is renamed', async () => {
    const registry = await buildNameRegistry(
      [person('Dagur Eggertsson'), entity('Eggertsson'), person('Dagur B. Eggertsson')],
      lookupOf({
        'Dagur Eggertsson': 'borgarstjóri',
        'Dagur B. Eggertsson': 'borgarstjóri',
      }),
    );

    expect(Object.fromEntries(registry)).toEqual({
      Eggertsson: { kind: 'ref', fullname: 'Dagur B. Eggertsson' },
      'Dagur B. Eggertsson': { kind: 'name', title: 'borgarstjóri' },
    });
  });

  it('should not look up names it already has', async () => {
    const lookup: DescriptionLookup = {
      personTitle: vi.fn().mockResolvedValue('forsætisráðherra'),
      entityDefinition: vi.fn().mockResolvedValue(''),
    };

    await buildNameRegistry([person('Katrín Jakobsdóttir'), person('Katrín Jakobsdóttir')], lookup);

    expect(lookup.personTitle).toHaveBeenCalledTimes(1);
  });
});
