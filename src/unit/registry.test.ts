import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { defineCommand, defineQuery } from './define';
import { UnitError } from './errors';
import { registerDomainUnits, UnitRegistry } from './registry';
import { PollingResource } from './resource';
import { s } from './schema';
import type { Resource, ResourceFactory, UnitContext } from './types';

function command(name: string, domain = 'demo') {
  return defineCommand({
    name,
    domain,
    description: `run ${name}`,
    input: z.object({}),
    inputSchema: s.object(),
    outputSchema: s.object(),
    execute: async () => ({}),
  });
}

function query(name: string, domain = 'demo') {
  return defineQuery({
    name,
    domain,
    description: `read ${name}`,
    input: z.object({}),
    inputSchema: s.object(),
    outputSchema: s.object(),
    execute: async () => ({}),
  });
}

class FixedResource extends PollingResource {
  readonly domain = 'demo';
  readonly schema = s.object();

  constructor(readonly uri: string) {
    super();
  }

  async get(_ctx: UnitContext): Promise<unknown> {
    return { uri: this.uri };
  }
}

const itemFactory: ResourceFactory = {
  pattern: 'asms://demo/item/*',
  canCreate: (uri) => uri.startsWith('asms://demo/item/'),
  create: (uri): Resource => new FixedResource(uri),
};

describe('unit registry', () => {
  test('registers and lists units sorted by name', () => {
    const registry = new UnitRegistry();
    registry.registerCommand(command('demo.b'));
    registry.registerCommand(command('demo.a'));
    registry.registerQuery(query('demo.get'));
    expect(registry.listCommands().map((unit) => unit.name)).toEqual(['demo.a', 'demo.b']);
    expect(registry.getQuery('demo.get')?.kind).toBe('query');
    expect(registry.getCommand('demo.get')).toBeUndefined();
    expect(registry.size).toBe(3);
  });

  test('rejects duplicate names', () => {
    const registry = new UnitRegistry();
    registry.registerCommand(command('demo.a'));
    expect(() => registry.registerCommand(command('demo.a'))).toThrowError(UnitError);
    expect(() => registry.registerCommand(command('demo.a'))).toThrow('command already registered: demo.a');
  });

  test('commands and queries share no namespace', () => {
    const registry = new UnitRegistry();
    registry.registerCommand(command('demo.same'));
    registry.registerQuery(query('demo.same'));
    expect(registry.describe().map((unit) => unit.kind)).toEqual(['command', 'query']);
  });

  test('resolves static resources before factories', () => {
    const registry = new UnitRegistry();
    const pinned = new FixedResource('asms://demo/item/pinned');
    registry.registerResource(pinned);
    registry.registerResourceFactory(itemFactory);
    expect(registry.getResource('asms://demo/item/pinned')).toBe(pinned);
    expect(registry.getResource('asms://demo/item/42')?.uri).toBe('asms://demo/item/42');
    expect(registry.getResource('asms://other/1')).toBeUndefined();
    expect(registry.listResourcePatterns()).toEqual(['asms://demo/item/*']);
  });

  test('describe filters by kind and copies examples', () => {
    const registry = new UnitRegistry();
    registry.registerCommand(command('demo.a'));
    registry.registerQuery(query('demo.q'));
    const [descriptor] = registry.describe('query');
    expect(descriptor).toEqual({
      kind: 'query',
      name: 'demo.q',
      domain: 'demo',
      description: 'read demo.q',
      input_schema: { type: 'object', properties: {} },
      output_schema: { type: 'object', properties: {} },
      examples: [],
    });
  });

  test('groups by domain', () => {
    const registry = new UnitRegistry();
    registry.registerCommand(command('demo.a'));
    registry.registerCommand(command('other.a', 'other'));
    registry.registerResource(new FixedResource('asms://demo/list'));
    expect(registry.domains()).toEqual(['demo', 'other']);
    const grouped = registry.listByDomain('demo');
    expect(grouped.commands.map((unit) => unit.name)).toEqual(['demo.a']);
    expect(grouped.resources.map((resource) => resource.uri)).toEqual(['asms://demo/list']);
  });

  test('registerDomainUnits refuses units from another domain', () => {
    const registry = new UnitRegistry();
    expect(() => registerDomainUnits(registry, 'demo', { commands: [command('other.a', 'other')] })).toThrow(
      'unit other.a does not belong to domain demo',
    );
  });
});
