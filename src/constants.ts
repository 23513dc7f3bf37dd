// ── Files ──

/** Name of the run-control document inside a run directory. */
export const RUN_CONTROL_FILE = "fort.15";

/** Scratch file the mutators write before renaming it over the document. */
export const TEMP_RUN_CONTROL_FILE = "temp.15";

/** Ellipse description file inside a sub-domain directory. */
export const ELLIPSE_SHAPE_FILE = "shape.e14";

/** Circle description file inside a sub-domain directory. */
export const CIRCLE_SHAPE_FILE = "shape.c14";

// ── Document syntax ──

/** Everything after the first occurrence of this character is commentary. */
export const COMMENT_DELIMITER = "!";

// ── Time ──

/** Recording windows are in days, the time step is in seconds. */
export const HOURS_PER_DAY = 24;
export const MINUTES_PER_HOUR = 60;
export const SECONDS_PER_MINUTE = 60;

// ── Sub-domain rewrite ──

/** RNDAY is shortened by 0.5% for the truncated sub-domain run. */
export const RNDAY_SCALE = 0.995;

/** Circle radius shrinks by radius / CIRCLE_MARGIN_DIVISOR (4%) before testing stations. */
export const CIRCLE_MARGIN_DIVISOR = 25;

// ── Output formatting ──

/** Width of the left-aligned value field on rewritten count and flag lines. */
export const VALUE_FIELD_WIDTH = 35;

/** Width of the left-aligned RNDAY value field. */
export const RNDAY_FIELD_WIDTH = 6;

/** Decimal places written for RNDAY. */
export const RNDAY_DECIMALS = 3;

/** Width of the right-aligned comment delimiter field after RNDAY. */
export const RNDAY_DELIMITER_WIDTH = 30;

/** Width of the hot-start file kind field on the NHSTAR line. */
export const HOT_START_KIND_WIDTH = 1;

/** Mantissa digits after the decimal point for station coordinates. */
export const STATION_COORDINATE_PRECISION = 8;
