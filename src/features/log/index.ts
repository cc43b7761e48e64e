export * from "./log.types";
export * from "./log.errors";
export * from "./nmea/nmea.types";
export { decodeNmeaLine, nmeaChecksum } from "./nmea/nmeaParser";
export { assembleStep, assembleDataSet, emptyAccumulator, isComplete } from "./assembler/record.assembler";
export { APPROX_EPSILON, foldDirection, modePair, type ChannelExtent } from "./binning/bin.reduce";
export { binDataSet, MIN_BIN_DURATION_MS, type BinColumn, type BinnedGraph } from "./binning/bin.window";
export { composeColumns, paint, type DrawCommand } from "./graph/graph.compositor";
export { RasterCanvas, type GraphCanvas } from "./graph/raster.canvas";
export { renderGraph, type RenderOptions } from "./graph/graph.render";
export { dataRange, loadLogFile, loadLogFromLines, loadLogFromStream, loadLogFromText } from "./service/log.loader";
export { createTimeWindowStore, type TimeWindowStore } from "./store/timeWindow.store";
