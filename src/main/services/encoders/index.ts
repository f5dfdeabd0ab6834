import { AppConfig } from '../../config';
import { FluentEncoder } from './fluent';
import { SystemEncoder } from './system';
import { Encoder } from './types';

export type { Encoder } from './types';
export { FluentEncoder, probeResultFromMetadata, rotationFromStream } from './fluent';
export { SystemEncoder } from './system';

export function createEncoder(config: Pick<AppConfig, 'encoder' | 'ffmpegPath' | 'ffprobePath'>): Encoder {
  if (config.encoder === 'fluent') {
    return new FluentEncoder({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath });
  }
  return new SystemEncoder(config.ffmpegPath);
}
