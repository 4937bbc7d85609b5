import type {
  ParameterDeclaration,
  ParameterSpec,
  ParameterType,
  ParameterValue,
} from '@credential-providers/models';
import { EnumTypePattern, ParameterSpecsSchema } from '@credential-providers/schemas';
import { ProviderError } from '../errors/index.js';
import type { Environment } from './common-config.js';

export type ParameterSpecs = Record<string, ParameterSpec>;

const INPUT_PREFIX = 'SMIN_';
const OUTPUT_PREFIX = 'SMOUT_';

const TRUE_VALUES = ['true', 't', '1', 'yes'];
const FALSE_VALUES = ['false', 'f', '0', 'no'];

function parseType(type: string): ParameterType {
  switch (type) {
    case 'string':
    case 'integer':
    case 'boolean':
    case 'secret_id':
      return { kind: type };
    default: {
      const match = EnumTypePattern.exec(type);
      if (!match?.[1]) {
        throw ProviderError.configuration(`unsupported parameter type '${type}'`);
      }
      return { kind: 'enum', options: match[1].split('|') };
    }
  }
}

/**
 * Environment variable an input is read from: `SMIN_FOO_BAR` → `SM_FOO_BAR_VALUE`.
 */
export function inputEnvironmentKey(name: string): string {
  return `SM_${name.slice(INPUT_PREFIX.length)}_VALUE`;
}

/**
 * Payload key an output is reported under: `SMOUT_FOO_BAR` → `foo_bar`.
 */
export function outputPayloadKey(name: string): string {
  return name.slice(OUTPUT_PREFIX.length).toLowerCase();
}

/**
 * Validates a job's parameter declarations.
 * @throws {ProviderError} Configuration error naming every invalid declaration
 */
export function parseParameterDeclarations(specs: ParameterSpecs): ParameterDeclaration[] {
  const parsed = ParameterSpecsSchema.safeParse(specs);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw ProviderError.configuration(`invalid parameter declarations: ${problems.join('; ')}`);
  }

  return Object.entries(parsed.data).map(([name, spec]): ParameterDeclaration => {
    const isInput = name.startsWith(INPUT_PREFIX);
    return {
      name,
      direction: isInput ? 'input' : 'output',
      key: isInput ? inputEnvironmentKey(name) : outputPayloadKey(name),
      type: parseType(spec.type),
      required: spec.required ?? false,
    };
  });
}

function convert(declaration: ParameterDeclaration, raw: string): ParameterValue {
  const { type, name } = declaration;
  switch (type.kind) {
    case 'integer': {
      if (!/^[-+]?\d+$/.test(raw)) {
        throw new Error(`${name} must be an integer, got '${raw}'`);
      }
      const value = Number(raw);
      if (!Number.isSafeInteger(value)) {
        throw new Error(`${name} is out of range`);
      }
      return value;
    }
    case 'boolean': {
      const normalized = raw.toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }
      throw new Error(`${name} must be a boolean, got '${raw}'`);
    }
    case 'enum':
      if (!type.options.includes(raw)) {
        throw new Error(`${name} must be one of ${type.options.join(', ')}, got '${raw}'`);
      }
      return raw;
    case 'string':
    case 'secret_id':
      return raw;
  }
}

/**
 * Typed view over the input values a job received.
 * @public
 */
export class ParameterValues {
  private readonly values: ReadonlyMap<string, ParameterValue>;

  public constructor(values: ReadonlyMap<string, ParameterValue>) {
    this.values = values;
  }

  public has(name: string): boolean {
    return this.values.has(name);
  }

  public string(name: string): string | undefined {
    const value = this.values.get(name);
    if (value !== undefined && typeof value !== 'string') {
      throw new TypeError(`parameter ${name} is not a string`);
    }
    return value;
  }

  public integer(name: string): number | undefined {
    const value = this.values.get(name);
    if (value !== undefined && typeof value !== 'number') {
      throw new TypeError(`parameter ${name} is not an integer`);
    }
    return value;
  }

  public boolean(name: string): boolean | undefined {
    const value = this.values.get(name);
    if (value !== undefined && typeof value !== 'boolean') {
      throw new TypeError(`parameter ${name} is not a boolean`);
    }
    return value;
  }

  /**
   * Value of a required string input.
   * @throws {ProviderError} Configuration error when it is absent
   */
  public requireString(name: string): string {
    const value = this.string(name);
    if (value === undefined) {
      throw ProviderError.configuration(`${name} is required`);
    }
    return value;
  }
}

/**
 * Reads and converts every declared input from the environment.
 * @throws {ProviderError} Configuration error listing every missing or malformed input
 */
export function readParameters(
  declarations: readonly ParameterDeclaration[],
  env: Environment,
): ParameterValues {
  const values = new Map<string, ParameterValue>();
  const problems: string[] = [];

  for (const declaration of declarations) {
    if (declaration.direction !== 'input') {
      continue;
    }
    const raw = env[declaration.key]?.trim();
    if (raw === undefined || raw === '') {
      if (declaration.required) {
        problems.push(`${declaration.name} (${declaration.key}) is required`);
      }
      continue;
    }
    try {
      values.set(declaration.name, convert(declaration, raw));
    } catch (error) {
      problems.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (problems.length > 0) {
    throw ProviderError.configuration(`invalid parameters: ${problems.join('; ')}`);
  }
  return new ParameterValues(values);
}
