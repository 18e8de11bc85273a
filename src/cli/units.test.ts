import { expect, test } from 'vitest';
import { registerCatalogUnits } from '../catalog';
import { UnitRegistry } from '../unit/registry';
import { formatUnitCatalog } from './units';

test('formatUnitCatalog groups units by domain and lists resources', () => {
  const registry = new UnitRegistry();
  registerCatalogUnits(registry, {});
  const lines = formatUnitCatalog(registry).split('\n');
  expect(lines[0]).toBe('catalog:');
  expect(lines[1]).toBe('  command catalog.apply_recipe     Plan the deployment of a recipe engine and models');
  expect(lines.slice(1, 8).map((line) => line.trim().split(/\s+/).slice(0, 2).join(' '))).toEqual([
    'command catalog.apply_recipe',
    'query catalog.check_status',
    'command catalog.create_recipe',
    'query catalog.get',
    'query catalog.list',
    'query catalog.match',
    'command catalog.validate_recipe',
  ]);
  expect(lines.slice(8)).toEqual(['resources:', '  asms://catalog/recipe/*', '  asms://catalog/recipes']);
});
