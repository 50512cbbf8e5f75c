// Centralized menu source registry

import type { MenuSource } from "../core/types/index";
import { adapter as matochmat } from "./matochmat/adapter";

// 1) Adapters dictionary (single source of truth for source keys)
const adapters = {
  matochmat,
} as const satisfies Record<string, MenuSource>;

// 2) Registry map derived from adapters dictionary
export const registry = new Map<string, MenuSource>(Object.entries(adapters));

export function getSourceKeys(): string[] {
  return Array.from(registry.keys());
}
