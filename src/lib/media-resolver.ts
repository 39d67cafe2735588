import { isWebVideoUrl } from "@/lib/media-types";
import type {
  MediaRef,
  PackageModel,
  PackageRelationship,
  ResolvedMedia,
  SlideMediaLinks,
  SlideModel,
} from "@/lib/types";

const MEDIA_PART_PREFIX = "ppt/media/";
const MEDIA_REL_SUFFIXES = ["/image", "/audio", "/video", "/media"];

function isMediaRelationship(rel: PackageRelationship): boolean {
  return MEDIA_REL_SUFFIXES.some((suffix) => rel.type.endsWith(suffix));
}

function isExternalVideo(rel: PackageRelationship): boolean {
  return rel.type.endsWith("/video") || rel.type.endsWith("/media") || isWebVideoUrl(rel.target);
}

function resolveSlide(slide: SlideModel, mediaByPart: Map<string, MediaRef>): SlideMediaLinks {
  const links: SlideMediaLinks = {
    embeddedMedia: [],
    externalVideoURLs: [],
    pictures: [],
    unresolvedTargets: [],
  };
  const refsByRelId = new Map<string, MediaRef>();

  for (const rel of slide.relationships) {
    if (rel.external) {
      if (isExternalVideo(rel) && !links.externalVideoURLs.includes(rel.target)) {
        links.externalVideoURLs.push(rel.target);
      }
      continue;
    }

    const partName = rel.partName ?? "";
    if (!isMediaRelationship(rel) && !partName.startsWith(MEDIA_PART_PREFIX)) {
      continue;
    }

    const ref = mediaByPart.get(partName);
    if (!ref) {
      links.unresolvedTargets.push(rel.target);
      console.warn(`[media] slide=${slide.index} rel=${rel.id} unresolved target=${rel.target}`);
      continue;
    }

    refsByRelId.set(rel.id, ref);
    // a video shape links its file twice (video + media relationships)
    if (!links.embeddedMedia.includes(ref)) {
      links.embeddedMedia.push(ref);
    }
  }

  for (const picture of slide.pictures) {
    const ref = refsByRelId.get(picture.relId);
    if (ref) {
      links.pictures.push({ media: ref, relId: picture.relId, frame: picture.frame });
    }
  }

  return links;
}

/**
 * Maps every slide's relationships onto the package media list. Relationship
 * order within a slide is manifest order; targets that point at media the
 * package does not contain are kept in `unresolvedTargets`.
 */
export function resolveMedia(pkg: PackageModel): ResolvedMedia {
  const mediaByPart = new Map(pkg.media.map((ref) => [ref.partName, ref]));
  const slides = new Map<number, SlideMediaLinks>();

  for (const slide of pkg.slides) {
    slides.set(slide.index, resolveSlide(slide, mediaByPart));
  }

  return { media: pkg.media, slides };
}
