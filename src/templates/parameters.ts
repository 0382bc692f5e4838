import Joi from 'joi';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { ValidationError, errorMessage } from '../errors';
import { ParameterEntry } from './types';

const parameterFileSchema = Joi.array()
  .items(
    Joi.object<ParameterEntry>({
      ParameterKey: Joi.string().min(1).required(),
      ParameterValue: Joi.string().allow('').required()
    }).unknown(false)
  )
  .messages({
    'array.base': 'Parameter file must contain a JSON array of ParameterKey/ParameterValue entries'
  });

/**
 * Keyed set of stack parameters. Keys are unique and the last write wins,
 * so fragments can be layered: defaults, certificate, network, overrides.
 */
export class ParameterSet {
  private readonly values = new Map<string, string>();

  constructor(entries: Iterable<[string, string]> = []) {
    for (const [key, value] of entries) {
      this.values.set(key, value);
    }
  }

  static fromRecord(record: Record<string, string>): ParameterSet {
    return new ParameterSet(Object.entries(record));
  }

  static fromEntries(entries: ParameterEntry[]): ParameterSet {
    return new ParameterSet(entries.map(entry => [entry.ParameterKey, entry.ParameterValue]));
  }

  set(key: string, value: string): this {
    this.values.set(key, value);
    return this;
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Returns a new set with the fragments applied in order over this one
   */
  merge(...fragments: Array<ParameterSet | Record<string, string> | undefined>): ParameterSet {
    const merged = new ParameterSet(this.values);
    for (const fragment of fragments) {
      if (!fragment) continue;
      const entries = fragment instanceof ParameterSet ? fragment.values.entries() : Object.entries(fragment);
      for (const [key, value] of entries) {
        merged.values.set(key, value);
      }
    }
    return merged;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  toEntries(): ParameterEntry[] {
    return Array.from(this.values, ([ParameterKey, ParameterValue]) => ({ ParameterKey, ParameterValue }));
  }
}

/**
 * Parses the content of a parameter file
 * @throws ValidationError on malformed JSON or an unexpected shape
 */
export function parseParameterFile(content: string, source = 'parameter file'): ParameterSet {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const { error, value } = parameterFileSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ValidationError(`Invalid ${source}: ${error.details.map(detail => detail.message).join('; ')}`);
  }
  return ParameterSet.fromEntries(value);
}

export async function readParameterFile(path: string): Promise<ParameterSet> {
  const content = await readFile(path, 'utf-8');
  return parseParameterFile(content, path);
}

/**
 * Reads a parameter file, or returns undefined when it does not exist
 */
export async function readOptionalParameterFile(path: string): Promise<ParameterSet | undefined> {
  if (!existsSync(path)) {
    return undefined;
  }
  return readParameterFile(path);
}

export async function writeParameterFile(path: string, parameters: ParameterSet): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(parameters.toEntries(), null, 2)}\n`);
}
