import { CODE_SLOT, NAME_SLOT, literal, type InterpreterSpec, type TemplateSlot } from '@core/types/language';
import { loggingConfig } from './logging';
import type { ConfigArgument, LanguageConfig, MdtaskConfig } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function isConfigArgument(value: unknown): value is ConfigArgument {
  if (typeof value === 'string') {
    return true;
  }
  return isRecord(value) && (value.slot === 'code' || value.slot === 'name');
}

export function isLanguageConfig(value: unknown): value is LanguageConfig {
  return (
    isRecord(value) &&
    typeof value.executable === 'string' &&
    value.executable.length > 0 &&
    Array.isArray(value.argv) &&
    value.argv.every(isConfigArgument)
  );
}

function isSlot(argument: ConfigArgument | undefined, slot: 'code' | 'name'): boolean {
  return typeof argument === 'object' && argument.slot === slot;
}

/**
 * A template is the whole argument vector: it starts with the name slot and contains the code slot.
 */
function findTemplateProblem(tag: string, argv: readonly ConfigArgument[]): string | null {
  if (!isSlot(argv[0], 'name')) {
    return `"languages.${tag}.argv" must start with { "slot": "name" }`;
  }
  if (!argv.some(argument => isSlot(argument, 'code'))) {
    return `"languages.${tag}.argv" must contain { "slot": "code" }`;
  }
  return null;
}

export function isLogLevel(value: unknown): value is string {
  return typeof value === 'string' && Object.keys(loggingConfig.levels).includes(value);
}

/**
 * Check a parsed config file. Returns the reason it is invalid, or null.
 */
export function findConfigProblem(value: unknown): string | null {
  if (!isRecord(value)) {
    return 'expected a JSON object';
  }

  if (value.languages !== undefined) {
    if (!isRecord(value.languages)) {
      return '"languages" must be an object';
    }
    for (const [tag, language] of Object.entries(value.languages)) {
      if (!isLanguageConfig(language)) {
        return `"languages.${tag}" needs an "executable" string and an "argv" array of strings or { "slot": "code" | "name" }`;
      }
      const problem = findTemplateProblem(tag, language.argv);
      if (problem) {
        return problem;
      }
    }
  }

  if (value.documentNames !== undefined && !isStringArray(value.documentNames)) {
    return '"documentNames" must be an array of strings';
  }

  if (value.logLevel !== undefined && !isLogLevel(value.logLevel)) {
    return `"logLevel" must be one of ${Object.keys(loggingConfig.levels).join(', ')}`;
  }

  return null;
}

export function isMdtaskConfig(value: unknown): value is MdtaskConfig {
  return findConfigProblem(value) === null;
}

function toSlot(argument: ConfigArgument): TemplateSlot {
  if (typeof argument === 'string') {
    return literal(argument);
  }
  return argument.slot === 'code' ? CODE_SLOT : NAME_SLOT;
}

export function toInterpreterSpec(language: LanguageConfig): InterpreterSpec {
  return {
    executable: language.executable,
    argv: language.argv.map(toSlot)
  };
}

export function toInterpreterSpecs(
  languages: Record<string, LanguageConfig> = {}
): Record<string, InterpreterSpec> {
  const specs: Record<string, InterpreterSpec> = {};
  for (const [tag, language] of Object.entries(languages)) {
    specs[tag] = toInterpreterSpec(language);
  }
  return specs;
}
