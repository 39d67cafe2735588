import JSZip from "jszip";
import sharp from "sharp";
import type { EmuRect } from "@/lib/types";

const NS_P = "http://schemas.openxmlformats.org/presentationml/2006/main";
const NS_A = "http://schemas.openxmlformats.org/drawingml/2006/main";
const NS_R = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const NS_PKG_RELS = "http://schemas.openxmlformats.org/package/2006/relationships";
const REL_BASE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const REL_MEDIA = "http://schemas.microsoft.com/office/2007/relationships/media";

export type FixtureRelationship = {
  id: string;
  type: "image" | "audio" | "video" | "media" | "hyperlink";
  target: string;
  external?: boolean;
};

export type FixturePicture = {
  relId: string;
  target: string;
  frame: EmuRect;
};

export type FixtureGroup = {
  frame: EmuRect;
  childFrame: EmuRect;
  pictures: FixturePicture[];
};

export type FixtureSlide = {
  notes?: string;
  pictures?: FixturePicture[];
  groups?: FixtureGroup[];
  relationships?: FixtureRelationship[];
};

export type FixtureDeck = {
  slideSize?: { cx: number; cy: number };
  slides: FixtureSlide[];
  media?: Record<string, Buffer>;
};

export const WIDE_SLIDE = { cx: 12_192_000, cy: 6_858_000 };

function relTypeUri(type: FixtureRelationship["type"]): string {
  return type === "media" ? REL_MEDIA : `${REL_BASE}/${type}`;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function relsXml(rels: Array<{ id: string; type: string; target: string; external?: boolean }>): string {
  const items = rels
    .map(
      (rel) =>
        `<Relationship Id="${rel.id}" Type="${rel.type}" Target="${escapeXml(rel.target)}"${
          rel.external ? ' TargetMode="External"' : ""
        }/>`,
    )
    .join("");
  return `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${NS_PKG_RELS}">${items}</Relationships>`;
}

function picXml(pic: FixturePicture, id: number): string {
  return (
    `<p:pic><p:nvPicPr><p:cNvPr id="${id}" name="Picture ${id}"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr>` +
    `<p:blipFill><a:blip r:embed="${pic.relId}"/></p:blipFill>` +
    `<p:spPr><a:xfrm><a:off x="${pic.frame.x}" y="${pic.frame.y}"/><a:ext cx="${pic.frame.cx}" cy="${pic.frame.cy}"/></a:xfrm></p:spPr></p:pic>`
  );
}

function groupXml(group: FixtureGroup, id: number): string {
  const { frame, childFrame } = group;
  const pics = group.pictures.map((pic, i) => picXml(pic, id + i + 1)).join("");
  return (
    `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${id}" name="Group ${id}"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr><a:xfrm><a:off x="${frame.x}" y="${frame.y}"/><a:ext cx="${frame.cx}" cy="${frame.cy}"/>` +
    `<a:chOff x="${childFrame.x}" y="${childFrame.y}"/><a:chExt cx="${childFrame.cx}" cy="${childFrame.cy}"/></a:xfrm></p:grpSpPr>` +
    `${pics}</p:grpSp>`
  );
}

function slideXml(slide: FixtureSlide): string {
  const pics = (slide.pictures ?? []).map((pic, i) => picXml(pic, i + 2)).join("");
  const groups = (slide.groups ?? []).map((group, i) => groupXml(group, 100 * (i + 1))).join("");
  return `<?xml version="1.0" encoding="UTF-8"?><p:sld xmlns:p="${NS_P}" xmlns:a="${NS_A}" xmlns:r="${NS_R}"><p:cSld><p:spTree>${pics}${groups}</p:spTree></p:cSld></p:sld>`;
}

function notesXml(notes: string): string {
  const paragraphs = notes
    .split("\n")
    .map((line) => `<a:p><a:r><a:t>${escapeXml(line)}</a:t></a:r></a:p>`)
    .join("");
  return (
    `<?xml version="1.0" encoding="UTF-8"?><p:notes xmlns:p="${NS_P}" xmlns:a="${NS_A}" xmlns:r="${NS_R}"><p:cSld><p:spTree>` +
    `<p:sp><p:nvSpPr><p:cNvPr id="2" name="Slide Image"/><p:cNvSpPr/><p:nvPr><p:ph type="sldImg"/></p:nvPr></p:nvSpPr></p:sp>` +
    `<p:sp><p:nvSpPr><p:cNvPr id="3" name="Notes"/><p:cNvSpPr/><p:nvPr><p:ph type="body" idx="1"/></p:nvPr></p:nvSpPr>` +
    `<p:txBody>${paragraphs}</p:txBody></p:sp></p:spTree></p:cSld></p:notes>`
  );
}

/**
 * Minimal presentation package: enough parts for the reader, nothing more.
 */
export async function buildPptx(deck: FixtureDeck): Promise<Buffer> {
  const zip = new JSZip();
  const size = deck.slideSize ?? WIDE_SLIDE;

  zip.file(
    "_rels/.rels",
    relsXml([{ id: "rId1", type: `${REL_BASE}/officeDocument`, target: "ppt/presentation.xml" }]),
  );

  const sldIds = deck.slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 10}"/>`).join("");
  zip.file(
    "ppt/presentation.xml",
    `<?xml version="1.0" encoding="UTF-8"?><p:presentation xmlns:p="${NS_P}" xmlns:a="${NS_A}" xmlns:r="${NS_R}">` +
      `<p:sldIdLst>${sldIds}</p:sldIdLst><p:sldSz cx="${size.cx}" cy="${size.cy}"/></p:presentation>`,
  );
  zip.file(
    "ppt/_rels/presentation.xml.rels",
    relsXml(
      deck.slides.map((_, i) => ({
        id: `rId${i + 10}`,
        type: `${REL_BASE}/slide`,
        target: `slides/slide${i + 1}.xml`,
      })),
    ),
  );

  deck.slides.forEach((slide, i) => {
    const n = i + 1;
    const rels: Array<{ id: string; type: string; target: string; external?: boolean }> = [
      { id: "rIdLayout", type: `${REL_BASE}/slideLayout`, target: "../slideLayouts/slideLayout1.xml" },
    ];
    for (const rel of slide.relationships ?? []) {
      rels.push({ id: rel.id, type: relTypeUri(rel.type), target: rel.target, external: rel.external });
    }
    for (const pic of [...(slide.pictures ?? []), ...(slide.groups ?? []).flatMap((group) => group.pictures)]) {
      rels.push({ id: pic.relId, type: relTypeUri("image"), target: pic.target });
    }
    if (slide.notes !== undefined) {
      rels.push({ id: "rIdNotes", type: `${REL_BASE}/notesSlide`, target: `../notesSlides/notesSlide${n}.xml` });
      zip.file(`ppt/notesSlides/notesSlide${n}.xml`, notesXml(slide.notes));
    }
    zip.file(`ppt/slides/slide${n}.xml`, slideXml(slide));
    zip.file(`ppt/slides/_rels/slide${n}.xml.rels`, relsXml(rels));
  });

  for (const [name, bytes] of Object.entries(deck.media ?? {})) {
    zip.file(`ppt/media/${name}`, bytes);
  }

  return zip.generateAsync({ type: "nodebuffer" });
}

export type Rgb = { r: number; g: number; b: number };

export async function makePng(width: number, height: number, color: Rgb): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

export async function makeGif(
  width: number,
  height: number,
  frames: Array<{ color: Rgb; delay: number }>,
): Promise<Buffer> {
  const pages = await Promise.all(frames.map((frame) => makePng(width, height, frame.color)));
  return sharp(pages, { join: { animated: true } })
    .gif({ delay: frames.map((frame) => frame.delay), loop: 0 })
    .toBuffer();
}

export async function pixelAt(image: Buffer, x: number, y: number): Promise<Rgb> {
  const { data, info } = await sharp(image).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return { r: data[offset], g: data[offset + 1], b: data[offset + 2] };
}

export async function readZipEntries(bytes: Buffer): Promise<Map<string, Buffer>> {
  const zip = await JSZip.loadAsync(bytes);
  const entries = new Map<string, Buffer>();
  for (const [name, entry] of Object.entries(zip.files)) {
    if (!entry.dir) {
      entries.set(name, await entry.async("nodebuffer"));
    }
  }
  return entries;
}
