export type Priority = 'low' | 'medium' | 'high' | 'critical';

export const PRIORITIES: readonly Priority[] = ['low', 'medium', 'high', 'critical'];

/** Every stored record belongs to exactly one tenant. */
export interface TenantRecord {
  id: string;
  tenantId: string;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };
