export * from './types/subtitles';
export * from './types/media';
export * from './types/api';

export { loadConfig } from './main/config';
export type { AppConfig, EncoderKind } from './main/config';
export { configureLogging, closeLogging, createLogger } from './main/services/log';
export type { Logger, LogLevel, LoggingOptions } from './main/services/log';
export * from './main/services/errors';

export * from './main/services/timecode';
export * from './main/services/cues';
export * from './main/services/segmenter';
export { parseSrt, parseSrtBlocks, serializeSrt, srtPathForTrack } from './main/services/srt';
export { colorToAssHex, composeAss, composeAssFromMap, resolveStyle, sanitizeAssText, styleName } from './main/services/ass';
export type { ResolvedStyle } from './main/services/ass';
export { FontRegistry, fontDisplayName } from './main/services/fonts';

export {
  buildScaleFilter,
  buildSubtitlesFilter,
  buildVideoFilter,
  defaultOutputPath,
  escapeFilterPath,
  parseProbeOutput,
  ProgressTracker,
} from './main/services/ffmpeg';
export { createEncoder, FluentEncoder, SystemEncoder } from './main/services/encoders';
export type { Encoder } from './main/services/encoders';
export { RenderOrchestrator } from './main/services/render';
export type { BurnCaptionsOptions, RenderOptions } from './main/services/render';

export { extractAudioToWav, transcribeWords } from './main/services/transcription';
export { languageName, OpenAiTranslator, SUPPORTED_LANGUAGES, translateTrack } from './main/services/translation';
export type { TranslateOptions, Translator } from './main/services/translation';

export { createHandlerContext } from './main/handlers/context';
export type { HandlerContext } from './main/handlers/context';
export { handleGenerateCaptions, handleResegment } from './main/handlers/caption-handler';
export { handleCancelRender, handleRenderVideo } from './main/handlers/render-handler';
export { handleExportSrt, handleImportSrt } from './main/handlers/srt-handler';
