/**
 * Search Configuration Schema
 *
 * Layer definitions and search settings, validated with Zod. Names marked
 * "template" accept the search tokens (%ref%, %shortref%, %subref%,
 * %sitename%, %radius%).
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

// ============================================================================
// Enumerations
// ============================================================================

export const AreaUnitSchema = z.enum(['ha', 'm2', 'km2']);

export const LinearUnitSchema = z.enum(['m', 'km']);

export const TableFormatSchema = z.enum(['csv', 'txt']);

/**
 * How each layer's selection becomes the temporary master output
 */
export const OutputTypeSchema = z.enum(['COPY', 'CLIP', 'OVERLAY', 'INTERSECT']);

export const CombinedSitesModeSchema = z.enum(['none', 'append', 'overwrite']);

export type TableFormat = z.infer<typeof TableFormatSchema>;
export type OutputType = z.infer<typeof OutputTypeSchema>;
export type CombinedSitesMode = z.infer<typeof CombinedSitesModeSchema>;

// ============================================================================
// Layers
// ============================================================================

export const LayerDefinitionSchema = z.object({
  layerName: z.string().min(1, 'layerName is required'),
  /** Template; kept layer name */
  gisOutputName: z.string().default(''),
  /** Template; table file name without extension */
  tableOutputName: z.string().default(''),
  columns: z.string().default(''),
  groupColumns: z.string().default(''),
  statisticsColumns: z.string().default(''),
  orderColumns: z.string().default(''),
  /** SQL expression refining the spatial selection */
  criteria: z.string().default(''),
  includeArea: z.boolean().default(false),
  includeDistance: z.boolean().default(false),
  includeRadius: z.boolean().default(false),
  format: TableFormatSchema.default('csv'),
  keepLayer: z.boolean().default(false),
  outputType: OutputTypeSchema.default('COPY'),
  combinedSitesColumns: z.string().default(''),
  combinedSitesGroupColumns: z.string().default(''),
  combinedSitesStatisticsColumns: z.string().default(''),
  combinedSitesOrderColumns: z.string().default(''),
  /** Script run by the post-export hook */
  macroName: z.string().default(''),
});

export type LayerDefinition = z.infer<typeof LayerDefinitionSchema>;

// ============================================================================
// Search
// ============================================================================

export const SearchSettingsSchema = z.object({
  /** Layer holding the search features */
  layerName: z.string().min(1, 'search.layerName is required'),
  /** Reference column matched against the search reference */
  column: z.string().min(1, 'search.column is required'),
  updateTable: z.boolean().default(false),
  siteColumn: z.string().default(''),
  organisationColumn: z.string().default(''),
  radiusColumn: z.string().default(''),
  /** Template */
  outputName: z.string().default('%shortref%_Search'),
  /** Template */
  bufferPrefix: z.string().default('%shortref%_Buffer'),
  /** Semicolon-separated dissolve fields for the buffer */
  bufferFields: z.string().default(''),
  keepBuffer: z.boolean().default(true),
  areaUnit: AreaUnitSchema.default('ha'),
  bufferUnits: LinearUnitSchema.default('m'),
});

export const CombinedSitesSchema = z.object({
  /** Template */
  tableName: z.string().default('%shortref%_Sites'),
  format: TableFormatSchema.default('csv'),
  mode: CombinedSitesModeSchema.default('none'),
  /** Header line of the combined table */
  columns: z.string().default(''),
});

export const SearchConfigSchema = z.object({
  workspace: z.string().min(1, 'workspace is required'),
  tempWorkspace: z.string().default(join(tmpdir(), 'data-searches-temp.sqlite')),
  /** Template */
  outputFolder: z.string().min(1, 'outputFolder is required'),
  /** Template */
  logFileName: z.string().default('%shortref%_Search.log'),
  clearLogFile: z.boolean().default(false),
  replacementCharacter: z.string().length(1).default('_'),
  search: SearchSettingsSchema,
  combinedSites: CombinedSitesSchema.default({}),
  layers: z.record(z.string(), LayerDefinitionSchema).default({}),
  engine: z
    .object({
      pollIntervalMs: z.number().int().positive().default(1000),
    })
    .default({}),
  hook: z
    .object({
      interpreter: z.string().min(1).default('sh'),
    })
    .default({}),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SearchConfigInput = z.input<typeof SearchConfigSchema>;
