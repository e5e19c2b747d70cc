function randomHex(length: number): string {
  let value = '';
  while (value.length < length) {
    value += Math.floor(Math.random() * 16).toString(16);
  }
  return value.slice(0, length);
}

function fallbackUuid(): string {
  return `${randomHex(8)}-${randomHex(4)}-4${randomHex(3)}-a${randomHex(3)}-${randomHex(12)}`;
}

export function generateId(): string {
  return globalThis.crypto?.randomUUID?.() ?? fallbackUuid();
}

export function ensureCorrelationId(correlationId?: string): string {
  return correlationId && correlationId.trim().length > 0 ? correlationId.trim() : generateId();
}
