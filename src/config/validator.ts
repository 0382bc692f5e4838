import Joi from 'joi';
import { UsageError } from '../errors';
import { ConfigValidationResult, EnvironmentFile, ResolverFlags } from './types';

const projectNameSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .min(1)
  .max(64)
  .messages({
    'string.pattern.base': 'Project name must start with a letter and contain only alphanumeric characters and hyphens',
    'string.max': 'Project name must be no more than 64 characters long'
  });

const environmentNameSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .min(1)
  .max(32)
  .messages({
    'string.pattern.base': 'Environment name must start with a letter and contain only alphanumeric characters and hyphens',
    'string.max': 'Environment name must be no more than 32 characters long'
  });

const regionSchema = Joi.string()
  .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
  .messages({
    'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
  });

// Resolver flags
const resolverFlagsSchema = Joi.object<ResolverFlags>({
  project: projectNameSchema.optional(),
  environment: environmentNameSchema.optional(),
  region: regionSchema.optional(),
  usePrivateCertificate: Joi.boolean().optional()
}).unknown(false).messages({
  'object.unknown': 'Unknown option: {#label}'
});

const environmentDefaultsSchema = Joi.object({
  projectName: projectNameSchema.optional(),
  region: regionSchema.optional(),
  certificateMode: Joi.string()
    .valid('managed', 'private')
    .optional()
    .messages({
      'any.only': 'Certificate mode must be one of: managed, private'
    }),
  parameterOverrides: Joi.object()
    .pattern(Joi.string(), Joi.string().allow(''))
    .optional()
    .messages({
      'object.pattern.match': 'Parameter overrides must be key-value pairs of strings'
    })
});

// Environment file: shared defaults plus one block per environment
const environmentFileSchema = Joi.object<EnvironmentFile>({
  defaults: environmentDefaultsSchema.optional(),
  environments: Joi.object()
    .pattern(environmentNameSchema, environmentDefaultsSchema)
    .optional()
}).unknown(false);

function toResult(error: Joi.ValidationError | undefined): ConfigValidationResult {
  if (error) {
    return { valid: false, errors: error.details.map(detail => detail.message) };
  }
  return { valid: true, errors: [] };
}

/**
 * Validates an environment file object against the schema
 */
export function validateEnvironmentFile(config: unknown): ConfigValidationResult {
  const { error } = environmentFileSchema.validate(config, { abortEarly: false });
  return toResult(error);
}

/**
 * Validates and normalizes an environment file
 * @throws UsageError if validation fails
 */
export function validateAndNormalizeEnvironmentFile(config: unknown): EnvironmentFile {
  const { error, value } = environmentFileSchema.validate(config ?? {}, { abortEarly: false });
  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new UsageError(`Environment configuration validation failed:\n${errors.join('\n')}`);
  }
  return value;
}

export function validateResolverFlags(flags: unknown): ConfigValidationResult {
  const { error } = resolverFlagsSchema.validate(flags, { abortEarly: false });
  return toResult(error);
}

/**
 * @throws UsageError on unknown flags or malformed values
 */
export function assertResolverFlags(flags: unknown): ResolverFlags {
  const { error, value } = resolverFlagsSchema.validate(flags, { abortEarly: false });
  if (error) {
    throw new UsageError(error.details.map(detail => detail.message).join('; '), {
      remediation: 'Run with --help to see the supported options'
    });
  }
  return value;
}

export function getEnvironmentFileSchema(): Joi.ObjectSchema<EnvironmentFile> {
  return environmentFileSchema;
}
