/**
 * Selection Export Constants
 *
 * Field names and layout assumptions shared by the engine and the pipeline.
 */

// ============================================================================
// Aggregation Output Layout
// ============================================================================

/**
 * Number of system fields the grouping primitive writes before any
 * caller-visible field.
 *
 * statistics → [OBJECTID, FREQUENCY, ...case fields, ...statistic fields]
 * dissolve   → [OBJECTID, Shape, ...group fields, ...statistic fields]
 *
 * The aggregate-name reconciler locates generated statistic fields by
 * position from this value. Changing it (or the engine's layout) is a
 * breaking change: the reconciler would rename the wrong field.
 */
export const LEADING_SYSTEM_FIELD_COUNT = 2;

// ============================================================================
// System and Derived Field Names
// ============================================================================

export const OBJECT_ID_FIELD = 'OBJECTID';
export const SHAPE_FIELD = 'Shape';
export const FREQUENCY_FIELD = 'FREQUENCY';

/** Written by the area calculation on polygon datasets */
export const AREA_FIELD = 'Area';
export const AREA_FIELD_LENGTH = 20;

/** Written only by the nearest join; the CSV writer truncates it */
export const DISTANCE_FIELD = 'Distance';

export const RADIUS_FIELD = 'Radius';
export const RADIUS_FIELD_LENGTH = 25;

/** Radius tag value meaning "do not add a radius column" */
export const NO_RADIUS = 'none';

// ============================================================================
// Engine Defaults
// ============================================================================

/** Interval between status checks while an engine operation executes */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

/** Buffer distance used in place of zero so the buffer is still a polygon */
export const MINIMUM_BUFFER_METRES = 0.01;

/** Statistic used when grouping is requested without any statistic */
export const PLACEHOLDER_STATISTIC = 'FIRST';
