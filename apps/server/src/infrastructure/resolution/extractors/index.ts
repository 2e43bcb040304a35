export { InnerTubeExtractor } from './InnerTubeExtractor';
export type { InnerTubeExtractorOptions } from './InnerTubeExtractor';
export { RutubeExtractor, findManifestUrl, playOptionsUrl } from './RutubeExtractor';
export type { RutubeExtractorOptions } from './RutubeExtractor';
export { YtDlpExtractor, formatSelector } from './YtDlpExtractor';
export type { YtDlpExtractorOptions } from './YtDlpExtractor';
export { PERSONAS, PLAYER_ENDPOINT, buildPlayerRequest } from './personas';
export type { ClientPersona, PersonaId, PlayerRequest } from './personas';
export { candidateFormats, parseStreamingData, hasAudio, isVideo } from './formatSelection';
export type { FormatCandidate } from './formatSelection';
export { parseMasterPlaylist, pickClosestVariant } from './hlsManifest';
