/**
 * Shared CLI utilities.
 */

import { DEFAULT_LANGUAGE, parseLanguage, type AppConfig, type Language } from '../config/app-config.js';
import { loadConfig, toRuntimeConfig, type ExternalConfig } from '../config/loader.js';

/**
 * Split `args` into positional words and `--name value` options. A flag
 * with no following value (or followed by another flag) is recorded as 'true'.
 */
export function parseArgs(args: string[]): { positional: string[]; options: Map<string, string> } {
  const positional: string[] = [];
  const options = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        options.set(arg.slice(2), next);
        i++;
      } else {
        options.set(arg.slice(2), 'true');
      }
    } else {
      positional.push(arg);
    }
  }

  return { positional, options };
}

/**
 * Language from --lang, falling back to the default. Unknown codes throw.
 */
export function languageOption(options: Map<string, string>): Language {
  const raw = options.get('lang');
  if (raw === undefined) return DEFAULT_LANGUAGE;
  const language = parseLanguage(raw);
  if (!language) {
    throw new Error(`Unknown language "${raw}" (expected FR, EN or TN)`);
  }
  return language;
}

/**
 * Resolved runtime configuration, with optional CLI overrides on top.
 */
export function loadRuntimeConfig(cliOverrides?: ExternalConfig): AppConfig {
  return toRuntimeConfig(loadConfig({ cliOverrides }));
}
