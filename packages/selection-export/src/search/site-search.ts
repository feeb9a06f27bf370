/**
 * Site Search Orchestrator
 *
 * Selects the search feature(s) by reference, buffers them and runs every
 * requested layer through the export pipeline:
 *
 *   select by location → refine by criteria → temporary master output
 *   → table export → keep layer → combined sites table → post-export hook
 *
 * A failed layer marks the search as failed; the remaining layers still run.
 */

import { mkdirSync } from 'node:fs';
import { userInfo } from 'node:os';
import { join, resolve } from 'node:path';
import type { DatasetRef, FeatureSource, FieldValue } from '../core/types/dataset.js';
import type { AreaUnit, LinearUnit } from '../core/types/engine.js';
import { MINIMUM_BUFFER_METRES } from '../core/constants.js';
import { errorMessage } from '../core/errors.js';
import { FileLogSink } from '../core/utils/log-sink.js';
import { createLogger } from '../core/utils/logger.js';
import { LocalDatasetEngine } from '../engine/local-engine.js';
import { LocalFeatureStore, describeRef } from '../engine/feature-store.js';
import { GEOJSON_EXTENSION } from '../engine/geojson-folder.js';
import type { CombinedSitesMode, LayerDefinition, OutputType, SearchConfig } from '../config/search-config.js';
import { run, type PipelineContext } from '../pipeline/context.js';
import { csvExists, writeEmptyCsv } from '../pipeline/csv-writer.js';
import { exportSelectionToCsv } from '../pipeline/export-csv.js';
import { splitSpec } from '../pipeline/field-projector.js';
import { withTemporary } from '../pipeline/lifecycle.js';
import { runPostExportHook } from '../pipeline/post-export-hook.js';
import { resolveField } from '../pipeline/schema-validator.js';
import { MapSession } from '../session/map-session.js';
import {
  bufferLayerName,
  replaceSearchStrings,
  searchStringsFor,
  stripIllegals,
  stripPathIllegals,
  type SearchStrings,
} from './naming.js';

const log = createLogger('site-search');

const LOG_RULE = '-'.repeat(71);

export interface SiteSearchRequest {
  /** Value of the search reference column */
  readonly reference: string;
  readonly siteName?: string;
  readonly organisation?: string;
  /** Buffer distance as entered, e.g. "500" or "0" */
  readonly bufferSize: string;
  /** Defaults to the configured buffer unit */
  readonly bufferUnit?: LinearUnit;
  /** Keys of `config.layers` to process, in order */
  readonly layers: readonly string[];
  /** Overrides the configured combined sites mode */
  readonly combinedSitesMode?: CombinedSitesMode;
}

export interface LayerResult {
  readonly layer: string;
  readonly success: boolean;
  readonly featureCount: number;
  /** Rows written to the layer's table; null when no table was written */
  readonly rowsExported: number | null;
  readonly combinedRows: number | null;
}

export interface SiteSearchResult {
  readonly success: boolean;
  readonly outputFolder: string;
  readonly logFile: string;
  readonly layers: readonly LayerResult[];
}

export interface SiteSearchOptions {
  /** Shared store; a private one is opened and closed otherwise */
  readonly store?: LocalFeatureStore;
  readonly onNotice?: (message: string) => void;
}

/**
 * Names resolved once per search
 */
interface SearchPlan {
  readonly strings: SearchStrings;
  readonly outputFolder: string;
  readonly searchOutput: DatasetRef;
  readonly bufferOutput: DatasetRef;
  readonly combinedSitesFile: string;
  readonly tempMaster: DatasetRef;
  readonly tempOutput: DatasetRef;
  readonly tempTable: DatasetRef;
  readonly areaUnit: AreaUnit;
}

// ============================================================================
// Entry
// ============================================================================

export async function runSiteSearch(
  config: SearchConfig,
  request: SiteSearchRequest,
  options: SiteSearchOptions = {}
): Promise<SiteSearchResult> {
  const replacement = config.replacementCharacter;
  const unit = request.bufferUnit ?? config.search.bufferUnits;
  const radius = `${request.bufferSize}${unit}`;
  const strings = searchStringsFor(request.reference, request.siteName ?? '', radius, replacement);
  const name = (template: string): string => stripIllegals(replaceSearchStrings(template, strings), replacement);

  const outputFolder = resolve(stripPathIllegals(replaceSearchStrings(config.outputFolder, strings), replacement));
  mkdirSync(outputFolder, { recursive: true });

  const sink = new FileLogSink(join(outputFolder, name(config.logFileName)));
  if (config.clearLogFile) sink.clear();

  const store = options.store ?? new LocalFeatureStore();
  const engine = new LocalDatasetEngine(store);
  const ctx: PipelineContext = {
    engine,
    store,
    session: new MapSession(),
    log: sink,
    pollIntervalMs: config.engine.pollIntervalMs,
    onNotice: options.onNotice,
  };

  const userId = currentUserId(sink);
  const temp = (datasetName: string): DatasetRef => ({ workspace: config.tempWorkspace, name: datasetName });
  const combinedSites = config.combinedSites;
  const plan: SearchPlan = {
    strings,
    outputFolder,
    searchOutput: { workspace: outputFolder, name: name(config.search.outputName) + GEOJSON_EXTENSION },
    bufferOutput: {
      workspace: outputFolder,
      name: bufferLayerName(name(config.search.bufferPrefix), radius) + GEOJSON_EXTENSION,
    },
    combinedSitesFile: join(outputFolder, `${name(combinedSites.tableName)}.${combinedSites.format}`),
    tempMaster: temp(`TempMaster_${userId}`),
    tempOutput: temp(`TempOutput_${userId}`),
    tempTable: temp(`TempOutput_${userId}DBF`),
    areaUnit: config.search.areaUnit,
  };

  sink.writeLine(LOG_RULE);
  sink.writeLine(`Processing search '${request.reference}'`);
  sink.writeLine(LOG_RULE);
  sink.writeLine('Parameters are as follows:');
  sink.writeLine(`Buffer distance: ${radius}`);
  sink.writeLine(`Output location: ${outputFolder}`);
  sink.writeLine(`Layers to process: ${request.layers.length}`);
  sink.writeLine(`Area measurement unit: ${plan.areaUnit}`);

  const layerResults: LayerResult[] = [];
  let success = false;
  try {
    const mode = request.combinedSitesMode ?? combinedSites.mode;
    await prepareSearchArea(ctx, config, request, plan);
    createCombinedSitesTable(ctx, plan, mode, combinedSites.columns);

    success = true;
    for (const layerKey of request.layers) {
      const definition = config.layers[layerKey];
      if (!definition) {
        sink.writeLine(`Layer ${layerKey} is not defined in the configuration`);
        layerResults.push({ layer: layerKey, success: false, featureCount: 0, rowsExported: null, combinedRows: null });
        success = false;
        continue;
      }
      const result = await processLayer(ctx, config, plan, layerKey, definition, mode);
      layerResults.push(result);
      if (!result.success) success = false;
    }

    await cleanUpSearch(ctx, config, plan);
  } catch (error) {
    success = false;
    sink.writeLine(errorMessage(error));
    options.onNotice?.(errorMessage(error));
  } finally {
    if (!options.store) store.close();
  }

  sink.writeLine(LOG_RULE);
  sink.writeLine(success ? 'Process complete' : 'Process complete with errors');
  sink.writeLine(LOG_RULE);
  log.info('Search finished', { reference: request.reference, success, layers: layerResults.length });

  return { success, outputFolder, logFile: sink.path, layers: layerResults };
}

function currentUserId(sink: FileLogSink): string {
  let name = '';
  try {
    name = stripIllegals(userInfo().username, '_');
  } catch (error) {
    log.debug('No user name available', { error: errorMessage(error) });
  }
  if (!name) {
    sink.writeLine("User ID not found. User ID used will be 'Temp'");
    return 'Temp';
  }
  return name;
}

// ============================================================================
// Search Features & Buffer
// ============================================================================

function quoteSql(value: string): string {
  return `'${value.split("'").join("''")}'`;
}

async function prepareSearchArea(
  ctx: PipelineContext,
  config: SearchConfig,
  request: SiteSearchRequest,
  plan: SearchPlan
): Promise<void> {
  const settings = config.search;
  const searchRef: DatasetRef = { workspace: config.workspace, name: settings.layerName };
  if (!ctx.store.exists(searchRef)) {
    throw new Error(`Search layer ${describeRef(searchRef)} does not exist`);
  }
  const searchLayer = ctx.session.addLayer(searchRef, settings.layerName);

  const selected = await run(ctx, {
    op: 'selectByAttributes',
    target: { ref: searchRef },
    where: `${settings.column} = ${quoteSql(request.reference)}`,
  });
  ctx.session.select(searchLayer.name, selected.selection ?? []);
  if (ctx.session.selectionCount(searchLayer.name) === 0) {
    throw new Error(`No features found in ${settings.layerName} for reference '${request.reference}'`);
  }

  if (settings.updateTable) {
    await updateSearchAttributes(ctx, searchRef, searchLayer.selection ?? [], [
      [settings.siteColumn, plan.strings.siteName],
      [settings.organisationColumn, request.organisation ?? ''],
      [settings.radiusColumn, plan.strings.radius],
    ]);
  }

  ctx.log.writeLine('Saving search feature(s)');
  await replaceDataset(ctx, plan.searchOutput);
  await run(ctx, { op: 'copyFeatures', input: ctx.session.sourceOf(searchLayer), output: plan.searchOutput });
  ctx.session.addLayer(plan.searchOutput);

  const outputInfo = ctx.store.describe(plan.searchOutput);
  const dissolveFields = splitSpec(settings.bufferFields, ';').flatMap((field) => {
    const resolved = outputInfo ? resolveField(outputInfo.fields, field) : undefined;
    return resolved ? [resolved.name] : [];
  });

  const size = Number(request.bufferSize);
  if (!Number.isFinite(size) || size < 0) {
    throw new Error(`Invalid buffer size '${request.bufferSize}'`);
  }
  const unit = request.bufferUnit ?? settings.bufferUnits;
  ctx.log.writeLine(`Buffering feature(s) with a distance of ${plan.strings.radius}`);
  await replaceDataset(ctx, plan.bufferOutput);
  await run(ctx, {
    op: 'buffer',
    input: { ref: plan.searchOutput },
    output: plan.bufferOutput,
    distance: size === 0 ? MINIMUM_BUFFER_METRES : size,
    unit: size === 0 ? 'm' : unit,
    dissolveFields,
  });
  ctx.session.addLayer(plan.bufferOutput);
}

async function updateSearchAttributes(
  ctx: PipelineContext,
  ref: DatasetRef,
  selection: readonly number[],
  assignments: ReadonlyArray<readonly [string, string]>
): Promise<void> {
  const info = ctx.store.describe(ref);
  const values: Record<string, FieldValue> = {};
  for (const [column, value] of assignments) {
    const field = column && info ? resolveField(info.fields, column) : undefined;
    if (field) values[field.name] = value;
  }
  if (Object.keys(values).length === 0) return;

  ctx.log.writeLine('Updating attributes in search layer ...');
  ctx.store.updateRows({ ref, objectIds: selection }, () => values);
}

/**
 * Remove an earlier copy of an output from the session and the store
 */
async function replaceDataset(ctx: PipelineContext, ref: DatasetRef): Promise<void> {
  const sessionName = ref.name.endsWith(GEOJSON_EXTENSION) ? ref.name.slice(0, -GEOJSON_EXTENSION.length) : ref.name;
  while (ctx.session.removeLayer(sessionName)) {
    log.debug('Removed stale layer', { name: sessionName });
  }
  if (ctx.store.exists(ref)) {
    await run(ctx, { op: 'delete', dataset: ref });
  }
}

function createCombinedSitesTable(
  ctx: PipelineContext,
  plan: SearchPlan,
  mode: CombinedSitesMode,
  header: string
): void {
  if (mode === 'overwrite' || (mode === 'append' && !csvExists(plan.combinedSitesFile))) {
    writeEmptyCsv(plan.combinedSitesFile, header);
    ctx.log.writeLine('Combined sites table started');
  }
}

async function cleanUpSearch(ctx: PipelineContext, config: SearchConfig, plan: SearchPlan): Promise<void> {
  ctx.log.writeLine('');
  if (config.search.keepBuffer) return;

  try {
    await replaceDataset(ctx, plan.bufferOutput);
    ctx.log.writeLine('Buffer layer deleted');
  } catch (error) {
    ctx.log.writeLine(`Error deleting the buffer layer: ${errorMessage(error)}`);
  }
}

// ============================================================================
// Layers
// ============================================================================

async function processLayer(
  ctx: PipelineContext,
  config: SearchConfig,
  plan: SearchPlan,
  layerKey: string,
  definition: LayerDefinition,
  combinedMode: CombinedSitesMode
): Promise<LayerResult> {
  const replacement = config.replacementCharacter;
  const name = (template: string): string =>
    stripIllegals(replaceSearchStrings(template, plan.strings), replacement);
  const tableOutputName = name(definition.tableOutputName);
  const outcome = { layer: layerKey, featureCount: 0, rowsExported: null, combinedRows: null };

  ctx.log.writeLine('');
  ctx.log.writeLine(`Starting analysis for ${layerKey}`);

  const layerRef: DatasetRef = { workspace: config.workspace, name: definition.layerName };
  if (!ctx.store.exists(layerRef)) {
    ctx.log.writeLine(`Layer ${describeRef(layerRef)} does not exist`);
    return { ...outcome, success: false };
  }
  const layer = ctx.session.findLayer(definition.layerName) ?? ctx.session.addLayer(layerRef, definition.layerName);

  try {
    ctx.log.writeLine(`Selecting features using selected feature(s) from layer ${plan.bufferOutput.name} ...`);
    const located = await run(ctx, {
      op: 'selectByLocation',
      target: { ref: layerRef },
      search: { ref: plan.bufferOutput },
    });
    ctx.session.select(layer.name, located.selection ?? []);

    if (ctx.session.selectionCount(layer.name) > 0 && definition.criteria) {
      ctx.log.writeLine(`Refining selection with criteria ${definition.criteria} ...`);
      const refined = await run(ctx, {
        op: 'selectByAttributes',
        target: ctx.session.sourceOf(layer),
        where: definition.criteria,
      });
      ctx.session.select(layer.name, refined.selection ?? []);
    }
  } catch (error) {
    ctx.log.writeLine(`Error selecting layer ${definition.layerName}: ${errorMessage(error)}`);
    return { ...outcome, success: false };
  }

  const featureCount = ctx.session.selectionCount(layer.name);
  if (featureCount === 0) {
    ctx.log.writeLine('No features found');
    return runMacro(ctx, config, plan, definition, tableOutputName, { ...outcome, success: true });
  }

  ctx.log.writeLine(`${featureCount.toLocaleString('en-GB')} feature(s) found`);

  const exported = await withTemporary(ctx, async (temporaries) => {
    const tempMaster = temporaries.track(plan.tempMaster);
    try {
      await createMapOutput(ctx, ctx.session.sourceOf(layer), plan.bufferOutput, tempMaster, definition.outputType);
    } catch (error) {
      ctx.log.writeLine(
        `Cannot output selection from ${definition.layerName} to ${describeRef(tempMaster)}: ${errorMessage(error)}`
      );
      return { ...outcome, featureCount, success: false };
    }
    const master = ctx.session.addLayer(tempMaster);

    const includeHeaders = definition.format === 'csv';
    const radius = definition.includeRadius ? plan.strings.radius : 'none';
    const common = {
      layerName: master.name,
      tempFeatures: temporaries.track(plan.tempOutput),
      tempTable: temporaries.track(plan.tempTable),
      includeArea: definition.includeArea,
      areaUnit: plan.areaUnit,
      includeDistance: definition.includeDistance,
      distanceTarget: { ref: plan.searchOutput },
      radius,
    };

    let rowsExported: number | null = null;
    if (definition.columns && tableOutputName) {
      ctx.log.writeLine('Extracting summary information ...');
      rowsExported = await exportSelectionToCsv(ctx, {
        ...common,
        outputPath: join(plan.outputFolder, `${tableOutputName}.${definition.format}`),
        columns: definition.columns,
        groupColumns: definition.groupColumns,
        statisticsColumns: definition.statisticsColumns,
        orderColumns: definition.orderColumns,
        includeHeaders,
        overwrite: true,
      });
      if (rowsExported < 0) {
        ctx.log.writeLine(`Error extracting summary from ${describeRef(tempMaster)}`);
        return { ...outcome, featureCount, rowsExported, success: false };
      }
      ctx.log.writeLine(`${rowsExported.toLocaleString('en-GB')} record(s) exported`);
    }

    if (definition.keepLayer) {
      const gisOutputName = name(definition.gisOutputName) || definition.layerName;
      const keep: DatasetRef = { workspace: plan.outputFolder, name: gisOutputName + GEOJSON_EXTENSION };
      ctx.log.writeLine(`Copying selected GIS features to ${keep.name} ...`);
      try {
        await replaceDataset(ctx, keep);
        await run(ctx, { op: 'copyFeatures', input: { ref: tempMaster }, output: keep });
      } catch (error) {
        ctx.log.writeLine(`Error keeping layer ${gisOutputName}: ${errorMessage(error)}`);
        return { ...outcome, featureCount, rowsExported, success: false };
      }
    }

    let combinedRows: number | null = null;
    if (definition.combinedSitesColumns && combinedMode !== 'none') {
      ctx.log.writeLine('Extracting summary output for combined sites table ...');
      combinedRows = await exportSelectionToCsv(ctx, {
        ...common,
        outputPath: plan.combinedSitesFile,
        columns: definition.combinedSitesColumns,
        groupColumns: definition.combinedSitesGroupColumns,
        statisticsColumns: definition.combinedSitesStatisticsColumns,
        orderColumns: definition.combinedSitesOrderColumns,
        includeHeaders: false,
        overwrite: false,
      });
      if (combinedRows < 0) {
        ctx.log.writeLine(`Error extracting summary for combined sites table from ${describeRef(tempMaster)}`);
        return { ...outcome, featureCount, rowsExported, combinedRows, success: false };
      }
      ctx.log.writeLine(`${combinedRows.toLocaleString('en-GB')} row(s) added to combined sites table`);
    }

    ctx.session.clearSelection(layer.name);
    ctx.log.writeLine('Analysis complete');
    return { ...outcome, featureCount, rowsExported, combinedRows, success: true };
  });

  if (!exported.success) return exported;
  return runMacro(ctx, config, plan, definition, tableOutputName, exported);
}

async function runMacro(
  ctx: PipelineContext,
  config: SearchConfig,
  plan: SearchPlan,
  definition: LayerDefinition,
  tableOutputName: string,
  result: LayerResult
): Promise<LayerResult> {
  if (!definition.macroName) return result;

  ctx.log.writeLine('Executing post-export script ...');
  const ok = await runPostExportHook(
    {
      interpreter: config.hook.interpreter,
      script: definition.macroName,
      outputFolder: plan.outputFolder,
      outputFile: `${tableOutputName}.${definition.format}`,
      spreadsheetFile: `${tableOutputName}.xlsx`,
    },
    ctx.log
  );
  if (!ok) {
    ctx.log.writeLine(`Error executing post-export script ${definition.macroName}`);
    return { ...result, success: false };
  }
  return result;
}

// ============================================================================
// Map Output
// ============================================================================

/**
 * Build the temporary master from the selection, by output type and the
 * geometry types of the layer and the buffer
 */
async function createMapOutput(
  ctx: PipelineContext,
  input: FeatureSource,
  buffer: DatasetRef,
  output: DatasetRef,
  outputType: OutputType
): Promise<void> {
  const layerType = ctx.store.sampleGeometryType(input.ref);
  const bufferType = ctx.store.sampleGeometryType(buffer);
  if (layerType === null || bufferType === null) {
    throw new Error(`Cannot determine the geometry type of ${describeRef(input.ref)}`);
  }

  const clippable = (subject: string, clipper: string): boolean =>
    (subject === 'polygon' && clipper === 'polygon') ||
    (subject === 'line' && (clipper === 'line' || clipper === 'polygon'));

  switch (outputType) {
    case 'CLIP':
      if (clippable(layerType, bufferType)) {
        ctx.log.writeLine('Clipping selected features ...');
        await run(ctx, { op: 'clip', input, clip: { ref: buffer }, output });
        return;
      }
      break;
    case 'OVERLAY':
      if (clippable(bufferType, layerType)) {
        ctx.log.writeLine('Overlaying selected features ...');
        await run(ctx, { op: 'clip', input: { ref: buffer }, clip: input, output });
        return;
      } else {
        const touching = await run(ctx, { op: 'selectByLocation', target: { ref: buffer }, search: input });
        const selection = touching.selection ?? [];
        if (selection.length > 0) {
          ctx.log.writeLine('Copying overlapping buffer features ...');
          await run(ctx, { op: 'copyFeatures', input: { ref: buffer, objectIds: selection }, output });
          return;
        }
      }
      break;
    case 'INTERSECT':
      if ((layerType === 'polygon' && bufferType === 'polygon') || (layerType === 'line' && bufferType === 'line')) {
        ctx.log.writeLine('Intersecting selected features ...');
        await run(ctx, { op: 'intersect', input, overlay: { ref: buffer }, output });
        return;
      }
      break;
    case 'COPY':
      break;
  }

  ctx.log.writeLine('Copying selected features ...');
  await run(ctx, { op: 'copyFeatures', input, output });
}
