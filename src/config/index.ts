import { config } from './config';
import { AppConfigSchema, type AppConfig, type AppConfigInput, type ValidatedConfig, type DerivedConfig } from './schema';
import { ZodError } from 'zod';
import { indexBufferBytes, indexCount, vertexBufferBytes, vertexCount, workgroupsFor, type Vec2 } from '../compute';
import { scanLimitFor } from '../pipeline';

let cachedConfig: ValidatedConfig | null = null;

function computeDerived(validatedConfig: AppConfig): DerivedConfig {
  const { terrain, probe } = validatedConfig;
  const chunkSize: Vec2 = [terrain.chunkSize.x, terrain.chunkSize.y];

  const verticesPerChunk = vertexCount(chunkSize);
  const indicesPerChunk = indexCount(chunkSize);
  const scanLimit = scanLimitFor(probe.scanMode, indicesPerChunk);

  return {
    verticesPerChunk,
    indicesPerChunk,
    vertexBufferBytes: vertexBufferBytes(chunkSize),
    indexBufferBytes: indexBufferBytes(chunkSize),
    workgroupsPerChunk: workgroupsFor(verticesPerChunk, terrain.workgroupSize),
    scanLimit,
    scanTruncates: scanLimit < indicesPerChunk,
  };
}

export function formatZodError(error: ZodError): string {
  const lines = ['Configuration validation failed:', ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        '',
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        '',
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        '',
      );
    }
  }

  lines.push('Please fix the configuration and restart the server.');

  return lines.join('\n');
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);

  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Validate a configuration object and attach derived values.
 * Throws after printing the formatted issues when validation fails.
 */
export function loadConfig(input: AppConfigInput): ValidatedConfig {
  try {
    const validated = AppConfigSchema.parse(input);

    const fullConfig: ValidatedConfig = {
      ...validated,
      derived: computeDerived(validated),
    };

    return deepFreeze(fullConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(formatZodError(error));
      throw new Error('Configuration validation failed. See error details above.');
    }
    throw error;
  }
}

export function getConfig(): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(config);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
