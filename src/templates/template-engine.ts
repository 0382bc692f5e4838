import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { parseDocument } from 'yaml';
import { TemplateError, errorMessage } from '../errors';
import { StackKind } from '../types';
import { TemplateInspection, TemplateSource } from './types';

const STACK_KINDS: StackKind[] = ['directory', 'routing'];

export const TEMPLATE_FILES: Record<StackKind, string> = {
  directory: join('cloudformation', 'cognito-infrastructure.yaml'),
  routing: join('cloudformation', 'alb-cognito-integration.yaml')
};

/**
 * Loads the static CloudFormation templates shipped with the project and
 * performs a structural check before they are sent for remote validation.
 */
export class TemplateEngine {
  private readonly files: Record<StackKind, string>;

  constructor(private readonly baseDir: string = process.cwd(), files: Partial<Record<StackKind, string>> = {}) {
    this.files = { ...TEMPLATE_FILES, ...files };
  }

  templatePath(kind: StackKind): string {
    return join(this.baseDir, this.files[kind]);
  }

  listTemplates(): Array<{ kind: StackKind; path: string }> {
    return STACK_KINDS.map(kind => ({ kind, path: this.templatePath(kind) }));
  }

  /**
   * @throws TemplateError when the file is missing or structurally invalid
   */
  async load(kind: StackKind): Promise<TemplateSource> {
    const path = this.templatePath(kind);
    if (!existsSync(path)) {
      throw new TemplateError(`Template not found: ${path}`);
    }

    const body = await readFile(path, 'utf-8');
    const inspection = this.inspect(body);
    if (!inspection.valid) {
      throw new TemplateError(`Template invalid: ${path}: ${inspection.errors.join('; ')}`);
    }

    return { kind, path, body };
  }

  /**
   * Structural check of a template body. CloudFormation short-form tags
   * (!Ref, !Sub, ...) are left unresolved and only produce warnings.
   */
  inspect(body: string): TemplateInspection {
    const errors: string[] = [];
    let parsed: unknown;

    try {
      const document = parseDocument(body, { logLevel: 'silent' });
      if (document.errors.length > 0) {
        return {
          valid: false,
          errors: document.errors.map(error => error.message),
          parameters: []
        };
      }
      parsed = document.toJS();
    } catch (error) {
      return { valid: false, errors: [errorMessage(error)], parameters: [] };
    }

    if (!isRecord(parsed)) {
      return { valid: false, errors: ['Template must be a mapping'], parameters: [] };
    }

    const resources = parsed.Resources;
    if (!isRecord(resources) || Object.keys(resources).length === 0) {
      errors.push('Template must contain at least one resource');
    } else {
      for (const [resourceName, resource] of Object.entries(resources)) {
        if (!isRecord(resource) || typeof resource.Type !== 'string') {
          errors.push(`Resource ${resourceName} missing Type property`);
        }
      }
    }

    const parameters = isRecord(parsed.Parameters) ? Object.keys(parsed.Parameters) : [];

    return { valid: errors.length === 0, errors, parameters };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
