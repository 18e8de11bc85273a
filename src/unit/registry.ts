import { UnitError } from './errors';
import type {
  Command,
  Query,
  Resource,
  ResourceFactory,
  UnitDescriptor,
  UnitKind,
} from './types';

export class UnitRegistry {
  private readonly commands = new Map<string, Command>();
  private readonly queries = new Map<string, Query>();
  private readonly resources = new Map<string, Resource>();
  private readonly factories: ResourceFactory[] = [];

  registerCommand(command: Command): void {
    this.assertName(command.name, 'command');
    if (this.commands.has(command.name)) {
      throw new UnitError('ALREADY_EXISTS', `command already registered: ${command.name}`);
    }
    this.commands.set(command.name, command);
  }

  registerQuery(query: Query): void {
    this.assertName(query.name, 'query');
    if (this.queries.has(query.name)) {
      throw new UnitError('ALREADY_EXISTS', `query already registered: ${query.name}`);
    }
    this.queries.set(query.name, query);
  }

  registerResource(resource: Resource): void {
    this.assertName(resource.uri, 'resource');
    if (this.resources.has(resource.uri)) {
      throw new UnitError('ALREADY_EXISTS', `resource already registered: ${resource.uri}`);
    }
    this.resources.set(resource.uri, resource);
  }

  registerResourceFactory(factory: ResourceFactory): void {
    if (this.factories.some((existing) => existing.pattern === factory.pattern)) {
      throw new UnitError(
        'ALREADY_EXISTS',
        `resource factory already registered: ${factory.pattern}`,
      );
    }
    this.factories.push(factory);
  }

  getCommand(name: string): Command | undefined {
    return this.commands.get(name);
  }

  getQuery(name: string): Query | undefined {
    return this.queries.get(name);
  }

  /** Static resources win over factories; factories are tried in registration order. */
  getResource(uri: string): Resource | undefined {
    const registered = this.resources.get(uri);
    if (registered) return registered;
    const factory = this.factories.find((candidate) => candidate.canCreate(uri));
    return factory?.create(uri);
  }

  listCommands(): Command[] {
    return [...this.commands.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  listQueries(): Query[] {
    return [...this.queries.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  listResources(): Resource[] {
    return [...this.resources.values()].sort((a, b) => a.uri.localeCompare(b.uri));
  }

  listResourcePatterns(): string[] {
    return this.factories.map((factory) => factory.pattern);
  }

  listByDomain(domain: string): { commands: Command[]; queries: Query[]; resources: Resource[] } {
    return {
      commands: this.listCommands().filter((unit) => unit.domain === domain),
      queries: this.listQueries().filter((unit) => unit.domain === domain),
      resources: this.listResources().filter((resource) => resource.domain === domain),
    };
  }

  domains(): string[] {
    const names = new Set<string>();
    for (const unit of this.commands.values()) names.add(unit.domain);
    for (const unit of this.queries.values()) names.add(unit.domain);
    for (const resource of this.resources.values()) names.add(resource.domain);
    return [...names].sort();
  }

  describe(kind?: Exclude<UnitKind, 'resource'>): UnitDescriptor[] {
    const units = [
      ...(kind === 'query' ? [] : this.listCommands()),
      ...(kind === 'command' ? [] : this.listQueries()),
    ];
    return units.map((unit) => ({
      kind: unit.kind,
      name: unit.name,
      domain: unit.domain,
      description: unit.description,
      input_schema: unit.inputSchema,
      output_schema: unit.outputSchema,
      examples: [...unit.examples],
    }));
  }

  get size(): number {
    return this.commands.size + this.queries.size + this.resources.size;
  }

  private assertName(name: string, kind: UnitKind): void {
    if (!name.trim()) {
      throw new UnitError('INVALID_INPUT', `${kind} name is required`);
    }
  }
}

/**
 * Registers a domain's units in one go, rejecting names that do not live
 * under the domain prefix.
 */
export function registerDomainUnits(
  registry: UnitRegistry,
  domain: string,
  units: {
    commands?: Command[];
    queries?: Query[];
    resources?: Resource[];
    factories?: ResourceFactory[];
  },
): void {
  const prefix = `${domain}.`;
  for (const unit of [...(units.commands ?? []), ...(units.queries ?? [])]) {
    if (!unit.name.startsWith(prefix) || unit.domain !== domain) {
      throw new UnitError('INVALID_INPUT', `unit ${unit.name} does not belong to domain ${domain}`);
    }
  }
  for (const command of units.commands ?? []) registry.registerCommand(command);
  for (const query of units.queries ?? []) registry.registerQuery(query);
  for (const resource of units.resources ?? []) registry.registerResource(resource);
  for (const factory of units.factories ?? []) registry.registerResourceFactory(factory);
}
