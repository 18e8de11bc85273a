import { toErrorInfo } from './errors';
import { createEvent, type EventPublisher, publishSafely } from './events';
import type { ExecutableUnit, UnitContext } from './types';

/**
 * Runs a decoded unit and publishes `<unit>.started`, `<unit>.completed` or
 * `<unit>.failed` around it. The unit's own error is rethrown untouched.
 */
export async function executeUnit<I, O>(
  unit: ExecutableUnit<I, O>,
  ctx: UnitContext,
  input: I,
  publisher?: EventPublisher,
): Promise<O> {
  const started = Date.now();
  publishSafely(
    publisher,
    createEvent(unit.domain, `${unit.name}.started`, { unit: unit.name, input }, ctx.requestId),
  );
  try {
    const output = await unit.execute(ctx, input);
    publishSafely(
      publisher,
      createEvent(
        unit.domain,
        `${unit.name}.completed`,
        { unit: unit.name, output, duration_ms: Date.now() - started },
        ctx.requestId,
      ),
    );
    return output;
  } catch (error) {
    publishSafely(
      publisher,
      createEvent(
        unit.domain,
        `${unit.name}.failed`,
        { unit: unit.name, error: toErrorInfo(error), duration_ms: Date.now() - started },
        ctx.requestId,
      ),
    );
    throw error;
  }
}
