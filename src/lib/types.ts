export type JobKind = "metadata" | "animation";

export type JobStatus = "queued" | "running" | "done" | "failed";

export type JobFailureReason =
  | "unreadable-package"
  | "slide-image-count-mismatch"
  | "timeout"
  | "internal-error";

export type JobRecord = {
  jobId: string;
  kind: JobKind;
  status: JobStatus;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  resultPath?: string;
  failureReason?: JobFailureReason;
  retrievedAt?: string;
};

export type SlideImageInput = {
  name: string;
  fileName: string;
  bytes: Buffer;
};

export type JobInputs = {
  packageName: string;
  packageBytes: Buffer;
  slideImages?: SlideImageInput[];
};

export type StoredSlideImage = {
  page: number;
  sourceName: string;
  ext: string;
  path: string;
};

export type MediaKind = "image" | "audio" | "video";

export type MediaKindClass = "image" | "media";

export type MediaRef = {
  kind: MediaKind;
  kindClass: MediaKindClass;
  sequence: number;
  ext: string;
  partName: string;
  fileName: string;
};

export type EmuRect = {
  x: number;
  y: number;
  cx: number;
  cy: number;
};

export type PixelRect = {
  left: number;
  top: number;
  width: number;
  height: number;
};

export type PackageRelationship = {
  id: string;
  type: string;
  target: string;
  external: boolean;
  partName?: string;
};

export type SlidePicture = {
  relId: string;
  frame: EmuRect;
};

export type SlideModel = {
  index: number;
  partName: string;
  relationships: PackageRelationship[];
  pictures: SlidePicture[];
  notes: string;
};

export type SlideSize = {
  cx: number;
  cy: number;
};

export type PackageModel = {
  slideSize: SlideSize;
  slides: SlideModel[];
  media: MediaRef[];
  readPart: (partName: string) => Promise<Buffer>;
};

export type PlacedMedia = {
  media: MediaRef;
  relId: string;
  frame: EmuRect;
};

export type SlideMediaLinks = {
  embeddedMedia: MediaRef[];
  externalVideoURLs: string[];
  pictures: PlacedMedia[];
  unresolvedTargets: string[];
};

export type ResolvedMedia = {
  media: MediaRef[];
  slides: Map<number, SlideMediaLinks>;
};

export type SlideRecord = {
  index: number;
  notes: string;
  externalVideoURLs: string[];
  embeddedMedia: MediaRef[];
  embeddedAudio: MediaRef[];
  embeddedVideo: MediaRef[];
  pictures: PlacedMedia[];
  unresolvedTargets: string[];
  aspectRatio: string;
  animationSource?: PlacedMedia;
  stillImage?: StoredSlideImage;
};

export type SlideMetadataDocument = {
  aspectRatio: string;
  notes: string[];
  externalVideoURLs: string[][];
  embeddedAudio: string[][];
  embeddedVideo: string[][];
};
