/**
 * Search Command
 *
 * Run a site search: buffer the search feature(s) for a reference and
 * export every requested layer.
 *
 * USAGE:
 *   data-searches search <reference> --radius <size> [--layers <keys...>]
 *
 * EXAMPLES:
 *   data-searches search "ES/2024/001" --radius 500 --site-name "North Field"
 *   data-searches search "ES/2024/001" --radius 1 --unit km --layers "Habitats - Woodland"
 *
 * @module cli/commands/search
 */

import type { LinearUnit } from '../../core/types/engine.js';
import type { CombinedSitesMode, SearchConfig } from '../../config/search-config.js';
import { runSiteSearch, type SiteSearchResult } from '../../search/site-search.js';
import type { CLILogger } from '../lib/logger.js';

export interface SearchOptions {
  readonly reference: string;
  readonly radius: string;
  readonly unit?: LinearUnit;
  readonly siteName?: string;
  readonly organisation?: string;
  /** Layer keys; every configured layer when absent */
  readonly layers?: readonly string[];
  readonly combinedSites?: CombinedSitesMode;
}

export async function runSearch(
  options: SearchOptions,
  config: SearchConfig,
  logger: CLILogger
): Promise<SiteSearchResult> {
  const layers = options.layers && options.layers.length > 0 ? options.layers : Object.keys(config.layers);

  const result = await runSiteSearch(
    config,
    {
      reference: options.reference,
      siteName: options.siteName,
      organisation: options.organisation,
      bufferSize: options.radius,
      bufferUnit: options.unit,
      layers,
      combinedSitesMode: options.combinedSites,
    },
    { onNotice: (message) => logger.error(message) }
  );

  logger.table(
    result.layers.map((layer) => ({
      layer: layer.layer,
      status: layer.success ? 'ok' : 'FAILED',
      features: layer.featureCount,
      rows: layer.rowsExported ?? '',
      combined: layer.combinedRows ?? '',
    })),
    ['layer', 'status', 'features', 'rows', 'combined']
  );
  logger.info(`Log written to ${result.logFile}`);
  return result;
}
