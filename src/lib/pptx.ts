import path from "node:path";
import JSZip from "jszip";
import { UnreadablePackageError } from "@/lib/errors";
import { EMBEDDED_AUDIO_EXTENSIONS } from "@/lib/media-types";
import type {
  EmuRect,
  MediaRef,
  PackageModel,
  PackageRelationship,
  SlideModel,
  SlidePicture,
  SlideSize,
} from "@/lib/types";
import {
  attr,
  childElements,
  findAll,
  findFirst,
  localNameOf,
  numericAttr,
  parseXmlString,
  relAttr,
} from "@/lib/xml";

const REL_TYPE_OFFICE_DOCUMENT =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument";
const DEFAULT_PRESENTATION_PART = "ppt/presentation.xml";
const MEDIA_PART_RE = /^ppt\/media\/(image|media)(\d+)\.([A-Za-z0-9]+)$/;

// 10in x 7.5in, what PowerPoint assumes when sldSz is missing
const DEFAULT_SLIDE_SIZE: SlideSize = { cx: 9_144_000, cy: 6_858_000 };

async function loadZip(bytes: Buffer): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch (error) {
    throw UnreadablePackageError.fromCause(error);
  }
}

async function readXmlPart(zip: JSZip, partName: string): Promise<Document | null> {
  const entry = zip.file(partName);
  if (!entry) {
    return null;
  }
  const xml = await entry.async("string");
  return parseXmlString(xml);
}

function relsPartFor(partName: string): string {
  const dir = path.posix.dirname(partName);
  const base = path.posix.basename(partName);
  return dir === "." ? `_rels/${base}.rels` : `${dir}/_rels/${base}.rels`;
}

export function resolvePartName(sourcePart: string, target: string): string {
  if (target.startsWith("/")) {
    return path.posix.normalize(target.slice(1));
  }
  const dir = path.posix.dirname(sourcePart);
  return path.posix.normalize(dir === "." ? target : `${dir}/${target}`);
}

async function readRelationships(zip: JSZip, partName: string): Promise<PackageRelationship[]> {
  const doc = await readXmlPart(zip, relsPartFor(partName));
  if (!doc) {
    return [];
  }

  return findAll(doc, "Relationship").map((el) => {
    const target = attr(el, "Target") ?? "";
    const external = (attr(el, "TargetMode") ?? "").toLowerCase() === "external";
    return {
      id: attr(el, "Id") ?? "",
      type: attr(el, "Type") ?? "",
      target,
      external,
      partName: external || !target ? undefined : resolvePartName(partName, target),
    };
  });
}

async function findPresentationPart(zip: JSZip): Promise<string> {
  const rootRels = await readRelationships(zip, "");
  const main = rootRels.find((rel) => rel.type === REL_TYPE_OFFICE_DOCUMENT && rel.partName);
  return main?.partName ?? DEFAULT_PRESENTATION_PART;
}

type PresentationPart = {
  partName: string;
  doc: Document;
  slideRelIds: string[];
};

function asUnreadable(error: unknown, context?: Record<string, unknown>): UnreadablePackageError {
  return error instanceof UnreadablePackageError ? error : UnreadablePackageError.fromCause(error, context);
}

async function readPresentation(zip: JSZip): Promise<PresentationPart> {
  let partName = DEFAULT_PRESENTATION_PART;
  let doc: Document | null;
  try {
    partName = await findPresentationPart(zip);
    doc = await readXmlPart(zip, partName);
  } catch (error) {
    throw asUnreadable(error, { partName });
  }
  if (!doc) {
    throw new UnreadablePackageError(`Not a presentation: ${partName} is missing.`, { partName });
  }
  if (localNameOf(doc.documentElement) !== "presentation") {
    throw new UnreadablePackageError(`Not a presentation: ${partName} has no presentation root.`, { partName });
  }

  const slideRelIds = findAll(doc, "sldId")
    .map((el) => relAttr(el, "id"))
    .filter((id): id is string => Boolean(id));

  return { partName, doc, slideRelIds };
}

function readSlideSize(doc: Document): SlideSize {
  const sldSz = findFirst(doc, "sldSz");
  const cx = numericAttr(sldSz, "cx");
  const cy = numericAttr(sldSz, "cy");
  if (!cx || !cy || cx <= 0 || cy <= 0) {
    return DEFAULT_SLIDE_SIZE;
  }
  return { cx, cy };
}

type FrameMapping = (frame: EmuRect) => EmuRect;

function readRect(xfrm: Element, offName: string, extName: string): EmuRect | null {
  const off = childElements(xfrm, offName)[0];
  const ext = childElements(xfrm, extName)[0];
  const x = numericAttr(off, "x");
  const y = numericAttr(off, "y");
  const cx = numericAttr(ext, "cx");
  const cy = numericAttr(ext, "cy");
  if (x === undefined || y === undefined || cx === undefined || cy === undefined) {
    return null;
  }
  return { x, y, cx, cy };
}

function shapeXfrm(shape: Element, propertiesName: string): Element | undefined {
  const properties = childElements(shape, propertiesName)[0];
  return properties ? childElements(properties, "xfrm")[0] : undefined;
}

/**
 * Maps frames given in a group's child space onto the space the group itself
 * sits in, through its `off/ext` and `chOff/chExt`.
 */
function groupMapping(group: Element, outer: FrameMapping): FrameMapping {
  const xfrm = shapeXfrm(group, "grpSpPr");
  const frame = xfrm ? readRect(xfrm, "off", "ext") : null;
  const child = xfrm ? readRect(xfrm, "chOff", "chExt") : null;
  if (!frame || !child) {
    return outer;
  }
  const scaleX = child.cx > 0 ? frame.cx / child.cx : 1;
  const scaleY = child.cy > 0 ? frame.cy / child.cy : 1;
  return (rect) =>
    outer({
      x: frame.x + (rect.x - child.x) * scaleX,
      y: frame.y + (rect.y - child.y) * scaleY,
      cx: rect.cx * scaleX,
      cy: rect.cy * scaleY,
    });
}

function collectPictures(container: Element, toSlide: FrameMapping, pictures: SlidePicture[]): void {
  for (const shape of childElements(container)) {
    const name = localNameOf(shape);
    if (name === "grpSp") {
      collectPictures(shape, groupMapping(shape, toSlide), pictures);
      continue;
    }
    if (name !== "pic") {
      continue;
    }
    const blip = findFirst(shape, "blip");
    const relId = blip ? relAttr(blip, "embed") : undefined;
    const xfrm = shapeXfrm(shape, "spPr");
    const frame = xfrm ? readRect(xfrm, "off", "ext") : null;
    if (relId && frame) {
      pictures.push({ relId, frame: toSlide(frame) });
    }
  }
}

/** Pictures on the shape tree in slide EMU, grouped ones included. */
function readPictures(slideDoc: Document): SlidePicture[] {
  const pictures: SlidePicture[] = [];
  const spTree = findFirst(slideDoc, "spTree");
  if (spTree) {
    collectPictures(spTree, (frame) => frame, pictures);
  }
  return pictures;
}

function paragraphText(paragraph: Element): string {
  let text = "";
  for (const child of childElements(paragraph)) {
    const name = localNameOf(child);
    if (name === "br") {
      text += "\n";
    } else if (name === "r" || name === "fld") {
      text += findAll(child, "t")
        .map((t) => t.textContent ?? "")
        .join("");
    }
  }
  return text;
}

export function readNotesText(notesDoc: Document): string {
  for (const shape of findAll(notesDoc, "sp")) {
    const placeholder = findFirst(shape, "ph");
    if (!placeholder || attr(placeholder, "type") !== "body") {
      continue;
    }
    const txBody = findFirst(shape, "txBody");
    if (!txBody) {
      return "";
    }
    return childElements(txBody, "p").map(paragraphText).join("\n");
  }
  return "";
}

async function readSlide(zip: JSZip, index: number, partName: string): Promise<SlideModel> {
  const slideDoc = await readXmlPart(zip, partName);
  if (!slideDoc) {
    throw new UnreadablePackageError(`Slide part ${partName} is missing.`, { partName, index });
  }

  const relationships = await readRelationships(zip, partName);
  const notesRel = relationships.find((rel) => rel.type.endsWith("/notesSlide") && rel.partName);

  let notes = "";
  if (notesRel?.partName) {
    const notesDoc = await readXmlPart(zip, notesRel.partName);
    notes = notesDoc ? readNotesText(notesDoc) : "";
  }

  return {
    index,
    partName,
    relationships,
    pictures: readPictures(slideDoc),
    notes,
  };
}

export function mediaFileName(kindClass: MediaRef["kindClass"], sequence: number, ext: string): string {
  return `${kindClass}${sequence}.${ext}`;
}

function listMedia(zip: JSZip): MediaRef[] {
  const media: MediaRef[] = [];
  zip.forEach((relativePath, entry) => {
    if (entry.dir) {
      return;
    }
    const match = relativePath.match(MEDIA_PART_RE);
    if (!match) {
      return;
    }
    const kindClass = match[1] === "image" ? "image" : "media";
    const sequence = Number(match[2]);
    const ext = match[3].toLowerCase();
    media.push({
      kind: kindClass === "image" ? "image" : EMBEDDED_AUDIO_EXTENSIONS.has(ext) ? "audio" : "video",
      kindClass,
      sequence,
      ext,
      partName: relativePath,
      fileName: mediaFileName(kindClass, sequence, ext),
    });
  });

  return media.sort((a, b) =>
    a.kindClass === b.kindClass ? a.sequence - b.sequence : a.kindClass === "image" ? -1 : 1,
  );
}

/**
 * Opens a presentation package and reads what the pipeline needs from it:
 * slide order and size, each slide's relationships, picture frames and notes,
 * and the embedded media list in insertion order.
 */
export async function openPackage(bytes: Buffer): Promise<PackageModel> {
  const zip = await loadZip(bytes);
  const presentation = await readPresentation(zip);
  const presentationRels = await readRelationships(zip, presentation.partName).catch((error: unknown) => {
    throw asUnreadable(error, { partName: presentation.partName });
  });
  const relsById = new Map(presentationRels.map((rel) => [rel.id, rel]));

  const slides: SlideModel[] = [];
  for (const [i, relId] of presentation.slideRelIds.entries()) {
    const slidePart = relsById.get(relId)?.partName;
    if (!slidePart) {
      throw new UnreadablePackageError(`Slide relationship ${relId} has no target.`, { relId });
    }
    try {
      slides.push(await readSlide(zip, i + 1, slidePart));
    } catch (error) {
      throw asUnreadable(error, { partName: slidePart });
    }
  }

  return {
    slideSize: readSlideSize(presentation.doc),
    slides,
    media: listMedia(zip),
    readPart: async (partName) => {
      const entry = zip.file(partName);
      if (!entry) {
        throw new Error(`Package part not found: ${partName}`);
      }
      return entry.async("nodebuffer");
    },
  };
}

export async function countSlides(bytes: Buffer): Promise<number> {
  const zip = await loadZip(bytes);
  const presentation = await readPresentation(zip);
  return presentation.slideRelIds.length;
}
