import { extensionDecoder } from '../../src/mapper-registry.js';

const markerDecoder = extensionDecoder('Marker', 0, () => ({ marker: true }));

export default function resolveMarker(magic: string) {
  return magic === 'MARK' ? markerDecoder : undefined;
}
