/**
 * @layerstack/core
 *
 * Layer model, image ingestion, layer store, selection and audio bookkeeping.
 *
 * @packageDocumentation
 */

// UUID generation
export { generateId } from './uuid';

// Errors
export { ImageDecodeError, LayerIndexError } from './errors';

// Image decoding
export { decodeImage, isJpeg } from './image-decoder';
export type { ImageDecoder } from './image-decoder';
export { decodePng, encodePng, isPng } from './png-codec';

// Layer factories
export {
  createImageLayer,
  applyLayerPatch,
  fallbackLayerSize,
  layerNameFromPath,
  DEFAULT_FALLBACK_MARGIN,
  UNNAMED_LAYER,
} from './layer-factory';
export type { CreateImageLayerOptions } from './layer-factory';

// Layer stack & selection
export { LayerStore } from './layer-store';
export { SelectionModel } from './selection-model';

// Audio attachment
export { AudioAttachment, AUDIO_FILE_EXTENSIONS } from './audio-attachment';

// Event bus
export { EventBusImpl } from './event-bus';

// Color utilities
export { blendColors, colorToHex, hexToColor } from './color-utils';
