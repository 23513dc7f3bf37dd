export * from "./types/run-control-types";
export {
  RunControlError, IoError, FormatError, MissingPrerequisiteError, GeometryFileError,
} from "./run-control/errors";
export { OUTPUT_TYPES, isChannelKey, lookupOutputType, type OutputType } from "./run-control/output-types";
export { computeTotalObservations, type RecordFields } from "./run-control/record-decoder";
export { scan, scanDocument, type ScanOptions } from "./run-control/scanner";
export {
  rewriteForSubDomain, rewriteDocument, type LineSink, type RewriteSummary, type StationTrim,
} from "./run-control/rewriter";
export { setHotStartFlag, setHotStartOutputCadence } from "./run-control/field-mutators";
export {
  contains, ellipseFromFoci, filterLocations, loadShape, shapeKindFromFlag, trimLocations, type GeometryShape,
} from "./geometry/shapes";
export { extentOf, generateGrid, toLocations, toTable, type CoordinateTable } from "./geometry/stations";
