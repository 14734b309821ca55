// mp4box 0.5.x ships no type declarations; only the parts used here are declared.
declare module 'mp4box' {
  export interface MP4VideoTrack {
    id: number;
    codec: string;
    timescale: number;
    duration: number;
    track_width: number;
    track_height: number;
    video?: {
      width: number;
      height: number;
    };
  }

  export interface MP4Info {
    duration: number;
    timescale: number;
    isFragmented: boolean;
    videoTracks: MP4VideoTrack[];
    audioTracks: unknown[];
  }

  export interface MP4BoxBuffer extends ArrayBuffer {
    fileStart: number;
  }

  export interface MP4File {
    onReady?: (info: MP4Info) => void;
    onError?: (e: string | Error) => void;

    appendBuffer(buffer: MP4BoxBuffer): number;
    flush(): void;
  }

  export function createFile(): MP4File;
}
