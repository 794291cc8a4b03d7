import { parseProgress } from './ffmpeg-bridge';
import { toMediaInfo } from './ffprobe-bridge';
import { getRuntimePaths } from './runtime-paths';
import { toYtDlpConfig } from './bridges.module';
import { commonArgs, parseDownloadProgress } from './ytdlp-bridge';

describe('parseProgress', () => {
  it('reads time, speed and fps from an ffmpeg status line', () => {
    const line = 'frame=  123 fps= 25 q=28.0 size=    1234kB time=00:00:05.12 bitrate= 1976.5kbits/s speed=1.02x';

    expect(parseProgress(line, 'p1', 20)).toEqual({
      processId: 'p1',
      percent: 26,
      time: '00:00:05.12',
      speed: '1.02',
      fps: 25,
    });
  });

  it('caps progress at 100 percent', () => {
    const progress = parseProgress('time=00:01:00.00', 'p2', 30);
    expect(progress?.percent).toBe(100);
  });

  it('ignores lines without a time field', () => {
    expect(parseProgress('Stream mapping:', 'p3', 30)).toBeNull();
  });
});

describe('toMediaInfo', () => {
  it('prefers the container duration and detects streams', () => {
    const info = toMediaInfo({
      format: { filename: 'a.mp4', nb_streams: 2, format_name: 'mov,mp4', duration: '45.020000' },
      streams: [
        { index: 0, codec_type: 'video', codec_name: 'h264', width: 1280, height: 720, r_frame_rate: '30000/1001' },
        { index: 1, codec_type: 'audio', codec_name: 'aac' },
      ],
    });

    expect(info).toEqual({
      duration: 45.02,
      hasVideo: true,
      hasAudio: true,
      videoCodec: 'h264',
      audioCodec: 'aac',
      width: 1280,
      height: 720,
      fps: 29.97,
      format: 'mov,mp4',
    });
  });

  it('falls back to the stream duration', () => {
    const info = toMediaInfo({
      format: { filename: 'b.mp4', nb_streams: 1, format_name: 'mp4' },
      streams: [{ index: 0, codec_type: 'video', duration: '12.5' }],
    });

    expect(info.duration).toBe(12.5);
    expect(info.hasAudio).toBe(false);
  });
});

describe('getRuntimePaths', () => {
  it('uses explicit overrides first', () => {
    const paths = getRuntimePaths({ ffmpegPath: '/x/ffmpeg', ffprobePath: '/x/ffprobe', ytdlpPath: '/x/yt-dlp' }, '/nonexistent');
    expect(paths).toEqual({ ffmpeg: '/x/ffmpeg', ffprobe: '/x/ffprobe', ytdlp: '/x/yt-dlp' });
  });

  it('falls back to the command name when nothing is bundled', () => {
    const ext = process.platform === 'win32' ? '.exe' : '';
    const paths = getRuntimePaths({}, '/nonexistent');
    expect(paths).toEqual({ ffmpeg: `ffmpeg${ext}`, ffprobe: `ffprobe${ext}`, ytdlp: `yt-dlp${ext}` });
  });
});

describe('parseDownloadProgress', () => {
  it('reads the progress template line', () => {
    expect(parseDownloadProgress('1048576/4194304 524288.5 eta 6 [ 25.0%]', 'd1')).toEqual({
      processId: 'd1',
      percent: 25,
      totalSize: 4194304,
      downloadedBytes: 1048576,
      downloadSpeed: 524288.5,
      eta: 6,
      phase: 'download',
    });
  });

  it('reports merging as post-processing', () => {
    expect(parseDownloadProgress('[Merger] Merging formats into "abc.mp4"', 'd2')?.phase).toBe('postprocess');
  });

  it('ignores other output', () => {
    expect(parseDownloadProgress('[youtube] abc: Downloading webpage', 'd3')).toBeNull();
  });
});

describe('yt-dlp arguments', () => {
  const paths = { ffmpeg: '/x/ffmpeg', ffprobe: '/x/ffprobe', ytdlp: '/x/yt-dlp' };

  it('passes the cookies file when one is configured', () => {
    expect(commonArgs(toYtDlpConfig(paths, { cookiesFile: 'secrets/cookies.txt' }))).toEqual([
      '--ffmpeg-location', '/x/ffmpeg',
      '--cookies', 'secrets/cookies.txt',
    ]);
  });

  it('leaves cookies out otherwise', () => {
    expect(commonArgs(toYtDlpConfig(paths, {}))).toEqual(['--ffmpeg-location', '/x/ffmpeg']);
  });
});
