import { UnitError } from '../unit/errors';

export const INFERENCE_DOMAIN = 'inference';

export function modelNotSpecified(): UnitError {
  return new UnitError('MODEL_NOT_SPECIFIED', 'model not specified', { domain: INFERENCE_DOMAIN });
}
