/**
 * Campaign File Loader
 *
 * Loads an optional YAML file that names a campaign and narrows the axes it
 * covers, e.g.
 *
 * ```yaml
 * name: int-keys-only
 * keys: [int]
 * argSpecs: [read-heavy, write-heavy]
 * concurrency: 2
 * failFast: false
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors/index.js';
import { CampaignFileSchema, formatZodIssues, type CampaignFile } from '../types/schemas.js';
import type { AxisSelection } from '../types/index.js';

export type { CampaignFile };

export class CampaignFileLoader {
  /**
   * Load a campaign from a YAML file, relative paths resolved against `baseDir`
   */
  load(path: string, baseDir: string = process.cwd()): CampaignFile {
    const absolutePath = resolve(baseDir, path);

    if (!existsSync(absolutePath)) {
      throw new ConfigurationError(`Campaign file not found: ${absolutePath}`, {
        code: 'CAMPAIGN_NOT_FOUND',
      });
    }

    return this.parse(readFileSync(absolutePath, 'utf-8'), absolutePath);
  }

  /**
   * Parse and validate campaign YAML text
   */
  parse(content: string, source: string = '<inline>'): CampaignFile {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(`Campaign file is not valid YAML: ${source}`, {
        code: 'CAMPAIGN_INVALID',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = CampaignFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid campaign file ${source}: ${formatZodIssues(parsed.error)}`, {
        code: 'CAMPAIGN_INVALID',
      });
    }
    return parsed.data;
  }
}

/**
 * Axis subset named by a campaign file
 */
export function campaignSelection(campaign: CampaignFile): AxisSelection {
  return {
    argSpecs: campaign.argSpecs,
    keys: campaign.keys,
    values: campaign.values,
    tables: campaign.tables,
  };
}
