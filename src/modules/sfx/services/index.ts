export { SFXClient } from './sfx-client.service';
export { createElevenLabsTransport, buildSoundGenerationUrl, acceptHeaderFor } from './elevenlabs.transport';
export type { ElevenLabsTransportOptions } from './elevenlabs.transport';
