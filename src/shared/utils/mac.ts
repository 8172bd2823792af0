const MAC_LENGTH = 6;

export function normalizeMacId(value?: string | null): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  const cleaned = trimmed.replace(/[:\-.\s]/g, '').toUpperCase();
  return cleaned || null;
}

/**
 * Parses `34ea34aabbcc`, `34:EA:34:AA:BB:CC` or `34-ea-34-aa-bb-cc` into the
 * six raw bytes, in the order written.
 */
export function parseMacAddress(value?: string | null): Buffer | null {
  const normalized = normalizeMacId(value);
  if (!normalized || !/^[0-9A-F]+$/.test(normalized) || normalized.length !== MAC_LENGTH * 2) {
    return null;
  }
  return Buffer.from(normalized, 'hex');
}

export function formatMacAddress(mac: Buffer): string {
  return Array.from(mac, (byte) => byte.toString(16).padStart(2, '0')).join(':');
}
