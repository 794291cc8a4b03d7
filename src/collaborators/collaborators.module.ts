import { Module } from '@nestjs/common';
import { BridgesModule } from '../bridges';
import { MEDIA_DOWNLOADER, PUBLISHER, VIDEO_SOURCE } from './interfaces/collaborators.interface';
import { LocalExportPublisher } from './local-export-publisher';
import { YtDlpMediaDownloader } from './ytdlp-media-downloader';
import { YtDlpVideoSource } from './ytdlp-video-source';

@Module({
  imports: [BridgesModule],
  providers: [
    YtDlpVideoSource,
    YtDlpMediaDownloader,
    LocalExportPublisher,
    { provide: VIDEO_SOURCE, useExisting: YtDlpVideoSource },
    { provide: MEDIA_DOWNLOADER, useExisting: YtDlpMediaDownloader },
    { provide: PUBLISHER, useExisting: LocalExportPublisher },
  ],
  exports: [VIDEO_SOURCE, MEDIA_DOWNLOADER, PUBLISHER],
})
export class CollaboratorsModule {}
