import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { WardenError, WardenErrorCode } from './errors';

/**
 * Read and parse a policy file. `.json` files are parsed as JSON,
 * everything else as YAML.
 */
export function loadPolicyFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new WardenError(`Invalid path for config '${filePath}'`, WardenErrorCode.ConfigNotFound);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const format = path.extname(filePath).toLowerCase();

  try {
    return format === '.json' ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    throw new WardenError(
      `Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      WardenErrorCode.PolicyUnparseable
    );
  }
}
