import type { UnitRegistry } from '../unit/registry';
import type { UnitDescriptor } from '../unit/types';

/** Unit catalogue grouped by domain, one line per unit. */
export function formatUnitCatalog(registry: UnitRegistry): string {
  const byDomain = new Map<string, UnitDescriptor[]>();
  for (const unit of registry.describe()) {
    const list = byDomain.get(unit.domain) ?? [];
    list.push(unit);
    byDomain.set(unit.domain, list);
  }
  const lines: string[] = [];
  for (const domain of [...byDomain.keys()].sort()) {
    lines.push(`${domain}:`);
    const units = (byDomain.get(domain) ?? []).slice().sort((a, b) => a.name.localeCompare(b.name));
    const width = Math.max(...units.map((unit) => unit.name.length));
    for (const unit of units) {
      lines.push(`  ${unit.kind.padEnd(7)} ${unit.name.padEnd(width)}  ${unit.description}`);
    }
  }
  const resources = registry.listResources().map((resource) => resource.uri);
  const patterns = registry.listResourcePatterns();
  if (resources.length > 0 || patterns.length > 0) {
    lines.push('resources:');
    for (const uri of [...resources, ...patterns].sort()) lines.push(`  ${uri}`);
  }
  return lines.join('\n');
}
