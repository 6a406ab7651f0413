import * as path from 'node:path';
import { JavaScriptAdapter } from './javascript_adapter.js';
import { PythonAdapter } from './python_adapter.js';
import type { LanguageAdapter, SourceDiscovery } from './types.js';

export function normalizeExtension(ext: string): string {
  if (!ext) return '';
  const normalized = ext.startsWith('.') ? ext : `.${ext}`;
  return normalized.toLowerCase();
}

/**
 * Maps file extensions to language adapters. Constructed explicitly and
 * passed to whoever needs it; there is no process-wide instance.
 */
export class LanguageRegistry {
  private readonly byExtension = new Map<string, LanguageAdapter>();

  /** Later registrations win for overlapping extensions. */
  register(adapter: LanguageAdapter): this {
    for (const ext of adapter.extensions) {
      const normalized = normalizeExtension(ext);
      if (normalized) this.byExtension.set(normalized, adapter);
    }
    return this;
  }

  unregister(ext: string): boolean {
    return this.byExtension.delete(normalizeExtension(ext));
  }

  resolve(filePath: string): LanguageAdapter | null {
    const ext = normalizeExtension(path.extname(filePath));
    if (!ext) return null;
    return this.byExtension.get(ext) ?? null;
  }

  supportedExtensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  adapters(): LanguageAdapter[] {
    return [...new Set(this.byExtension.values())];
  }
}

export function createDefaultRegistry(options: { discovery: SourceDiscovery }): LanguageRegistry {
  return new LanguageRegistry()
    .register(new PythonAdapter(options.discovery))
    .register(new JavaScriptAdapter(options.discovery, 'javascript'))
    .register(new JavaScriptAdapter(options.discovery, 'typescript'))
    .register(new JavaScriptAdapter(options.discovery, 'tsx'));
}
