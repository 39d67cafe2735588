// Extensions PowerPoint accepts for embedded audio. Anything else stored as
// mediaN.* is treated as video.
export const EMBEDDED_AUDIO_EXTENSIONS = new Set([
  "aif",
  "aiff",
  "au",
  "snd",
  "mid",
  "midi",
  "mp3",
  "mpga",
  "m4a",
  "wav",
  "wave",
  "bwf",
  "aa",
  "aax",
  "wma",
  "aac",
  "caf",
  "m4r",
  "ac3",
  "eac3",
]);

export const WEB_VIDEO_EXTENSIONS = new Set([
  "mov",
  "qt",
  "mp4",
  "m4v",
  "mpg",
  "mpeg",
  "mpe",
  "m15",
  "m75",
  "m2v",
  "ts",
  "wmv",
  "dvi",
  "avi",
  "vfw",
  "asf",
]);

// Host prefixes end in "/" so youtube.com.example.net does not match.
export const WEB_VIDEO_URL_PREFIXES = [
  "https://www.youtube.com/",
  "https://youtube.com/",
  "https://youtu.be/",
  "https://player.vimeo.com/",
  "https://vimeo.com/",
  "https://www.dailymotion.com/",
  "https://dailymotion.com/",
];

export const ALLOWED_PACKAGE_EXTENSIONS = new Set([".pptx"]);

export const ALLOWED_SLIDE_IMAGE_EXTENSIONS = new Set([".png", ".gif", ".jpg", ".jpeg", ".tif", ".tiff"]);

export function extensionOf(name: string): string {
  const match = name.match(/\.([A-Za-z0-9]+)$/);
  return match ? match[1].toLowerCase() : "";
}

export function isWebVideoUrl(url: string): boolean {
  const lowered = url.trim().toLowerCase();
  if (WEB_VIDEO_URL_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
    return true;
  }

  const pathname = URL.canParse(lowered) ? new URL(lowered).pathname : lowered;
  return WEB_VIDEO_EXTENSIONS.has(extensionOf(pathname));
}
