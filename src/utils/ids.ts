import { randomBytes } from 'node:crypto';

export function randomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/** `req_` followed by 32 lowercase hex characters. */
export function generateRequestId(): string {
  return `req_${randomHex(16)}`;
}

export function generateModelId(): string {
  return `model-${randomHex(4)}`;
}

export function generateRecipeId(): string {
  return `recipe-${randomHex(4)}`;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
