/**
 * Helper to generate test PDFs with known text and image placement.
 * Uses mupdf to create PDFs programmatically so tests don't depend on external files.
 */
import mupdf from "mupdf";

type PDFDoc = InstanceType<typeof mupdf.PDFDocument>;
type PDFObj = ReturnType<PDFDoc["newDictionary"]>;

export interface TextRun {
  text: string;
  /** Baseline position in PDF space (origin bottom-left) */
  x: number;
  y: number;
  size: number;
  font?: "F1" | "F2" | "F3";
}

const FONTS: Record<NonNullable<TextRun["font"]>, string> = {
  F1: "Helvetica",
  F2: "Helvetica-Bold",
  F3: "Courier",
};

function escapePdfString(text: string): string {
  return text.replace(/([\\()])/g, "\\$1");
}

function textStream(runs: readonly TextRun[]): string {
  return runs
    .map(
      (run) =>
        `BT /${run.font ?? "F1"} ${run.size} Tf ${run.x} ${run.y} Td (${escapePdfString(run.text)}) Tj ET`
    )
    .join("\n");
}

function fontResources(doc: PDFDoc): PDFObj {
  const fonts = doc.newDictionary();
  for (const [key, name] of Object.entries(FONTS)) {
    fonts.put(key, doc.addSimpleFont(new mupdf.Font(name), "Latin"));
  }
  return fonts;
}

/**
 * 20x20 two-colour test image as an image XObject.
 */
function addTestImage(doc: PDFDoc): PDFObj {
  const size = 20;
  const pixmap = new mupdf.Pixmap(mupdf.ColorSpace.DeviceRGB, [0, 0, size, size], false);
  pixmap.clear(255);
  const samples = pixmap.getPixels();
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const i = (y * size + x) * 3;
      samples[i] = x < size / 2 ? 255 : 0;
      samples[i + 1] = 0;
      samples[i + 2] = x < size / 2 ? 0 : 255;
    }
  }
  return doc.addImage(new mupdf.Image(pixmap));
}

export interface TestPage {
  runs: TextRun[];
  /** Draw the test image at [x, y, width, height] in PDF space */
  image?: [number, number, number, number];
}

/**
 * Build a PDF with 612x792 pages, one per entry.
 */
export function createTextPdf(pages: readonly TestPage[]): Buffer {
  const doc = new mupdf.PDFDocument();
  const fonts = fontResources(doc);

  for (const page of pages) {
    const resourcesDict = doc.newDictionary();
    resourcesDict.put("Font", fonts);

    let stream = textStream(page.runs);
    if (page.image) {
      const [x, y, w, h] = page.image;
      const xobjects = doc.newDictionary();
      xobjects.put("Im1", addTestImage(doc));
      resourcesDict.put("XObject", xobjects);
      stream += `\nq\n${w} 0 0 ${h} ${x} ${y} cm\n/Im1 Do\nQ`;
    }

    const buf = new mupdf.Buffer();
    buf.writeLine(stream);
    const resources = doc.addObject(resourcesDict);
    doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, resources, buf));
  }

  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

/**
 * Two-page sample: a chapter with body text, a code line and a figure with
 * its caption on page 1, a second chapter on page 2.
 */
export function createSamplePdf(): Buffer {
  return createTextPdf([
    {
      runs: [
        { text: "Chapter 1 Introduction", x: 72, y: 720, size: 20, font: "F2" },
        { text: "This chapter describes the sample document.", x: 72, y: 690, size: 11 },
        { text: "let total = 0;", x: 72, y: 670, size: 11, font: "F3" },
        { text: "Figure 1: Sample image", x: 100, y: 480, size: 11 },
      ],
      image: [100, 500, 200, 150],
    },
    {
      runs: [
        { text: "Chapter 2 Details", x: 72, y: 720, size: 20, font: "F2" },
        { text: "The second chapter has one paragraph.", x: 72, y: 690, size: 11 },
      ],
    },
  ]);
}
