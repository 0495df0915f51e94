/**
 * Geocode module exports
 *
 * Hilbert curve geohashes: coordinate quantization, the curve transform,
 * the code alphabet and the encode/decode façade.
 */

// Constants
export {
  CoordinateIntervals,
  BITS_PER_CHAR_OPTIONS,
  CodeAlphabets,
  ZERO_CHAR,
  EncodingDefaults,
  MAX_CURVE_LEVEL,
  MAX_CURVE_BITS,
  isBitsPerChar,
  type BitsPerChar,
} from './GeocodeConstants';

// Errors
export {
  OutOfRangeError,
  InvalidArgumentError,
  PreconditionViolationError,
  isGeocodeError,
  type GeocodeError,
  type GeocodeErrorCode,
} from './GeocodeErrors';

// Code alphabet
export { encodeInt, decodeInt, assertBitsPerChar } from './CodeAlphabet';

// Grid quantizer
export {
  type Coordinate,
  type GridCell,
  type BoundaryPolicy,
  assertCoordinate,
  dimForLevel,
  coordinateToCell,
  cellToCoordinate,
} from './GridQuantizer';

// Curve transform
export { rotate, cellToIndex, indexToCell } from './HilbertCurve';

// Error margins
export { type ErrorMargin, errorForLevel } from './ErrorMargin';

// Codec
export {
  type DecodedCode,
  type EncodeOptions,
  levelFor,
  encode,
  decode,
  decodeExactly,
} from './HilbertGeohash';

// Cell geometry
export {
  type CellBounds,
  type Position,
  type PolygonGeometry,
  type LineStringGeometry,
  type Feature,
  type CellProperties,
  type CurveProperties,
  cellBounds,
  rectangle,
  hilbertCurve,
} from './CellGeometry';

// Config
export {
  type GeocodeConfig,
  type GeocodeConfigOverrides,
  type Geocoder,
  geocodeConfigSchema,
  DEFAULT_GEOCODE_CONFIG,
  DEFAULT_CONFIG_PATH,
  loadGeocodeConfig,
  getGeocodeConfig,
  reloadGeocodeConfig,
  setGeocodeConfig,
  createGeocoder,
} from './GeocodeConfig';
