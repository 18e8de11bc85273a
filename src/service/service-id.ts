import { invalidServiceId } from './errors';

const PREFIX = 'svc-';

export interface ServiceId {
  engine: string;
  modelId: string;
}

export function formatServiceId(engine: string, modelId: string): string {
  return `${PREFIX}${engine}-${modelId}`;
}

/** The model id may itself contain dashes; the engine may not. */
export function parseServiceId(id: string): ServiceId {
  if (!id.startsWith(PREFIX)) throw invalidServiceId(id);
  const rest = id.slice(PREFIX.length);
  const dash = rest.indexOf('-');
  if (dash <= 0 || dash === rest.length - 1) throw invalidServiceId(id);
  return { engine: rest.slice(0, dash), modelId: rest.slice(dash + 1) };
}
