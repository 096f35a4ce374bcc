import fs from 'fs';
import os from 'os';
import path from 'path';
import { PdfJsReader } from '../src/infrastructure/pdf/PdfJsReader.js';

interface TextRun {
  text: string;
  x: number;
  y: number;
  size: number;
}

/**
 * Minimal PDF: one Helvetica text run per entry, one content stream per page
 */
function buildPdf(pages: TextRun[][]): Buffer {
  const fontId = 3 + pages.length * 2;
  const objects: string[] = [];

  objects[1] = '<< /Type /Catalog /Pages 2 0 R >>';
  const kids = pages.map((_, i) => `${3 + i * 2} 0 R`).join(' ');
  objects[2] = `<< /Type /Pages /Kids [${kids}] /Count ${pages.length} >>`;

  pages.forEach((runs, i) => {
    const pageId = 3 + i * 2;
    const content = runs
      .map((run) => `BT /F1 ${run.size} Tf ${run.x} ${run.y} Td (${run.text}) Tj ET`)
      .join('\n');
    objects[pageId] =
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ` +
      `/Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${pageId + 1} 0 R >>`;
    objects[pageId + 1] = `<< /Length ${content.length} >>\nstream\n${content}\nendstream`;
  });
  objects[fontId] = '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>';

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  for (let id = 1; id <= fontId; id++) {
    offsets[id] = body.length;
    body += `${id} 0 obj\n${objects[id]}\nendobj\n`;
  }

  const xrefOffset = body.length;
  body += `xref\n0 ${fontId + 1}\n0000000000 65535 f \n`;
  for (let id = 1; id <= fontId; id++) {
    body += `${String(offsets[id]).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${fontId + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, 'latin1');
}

describe('PdfJsReader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'manual-assistant-pdf-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('should return one entry per page in reading order', async () => {
    const pdfPath = path.join(tmpDir, 'manual.pdf');
    fs.writeFileSync(
      pdfPath,
      buildPdf([
        [
          { text: 'right', x: 300, y: 650, size: 12 },
          { text: 'Title', x: 72, y: 720, size: 24 },
          { text: 'left', x: 72, y: 650, size: 12 },
        ],
        [{ text: 'Second page', x: 72, y: 720, size: 12 }],
      ])
    );

    const pages = await new PdfJsReader().readPages(pdfPath);

    expect(pages).toEqual(['Title\nleft right\n', 'Second page\n']);
  });

  test('should not print pdfjs warnings while reading', async () => {
    const pdfPath = path.join(tmpDir, 'quiet.pdf');
    fs.writeFileSync(pdfPath, buildPdf([[{ text: 'Torque table', x: 72, y: 720, size: 12 }]]));
    const consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    try {
      await new PdfJsReader().readPages(pdfPath);
      expect(consoleLog).not.toHaveBeenCalled();
    } finally {
      consoleLog.mockRestore();
    }
  });

  test('should keep empty pages as empty entries', async () => {
    const pdfPath = path.join(tmpDir, 'blank.pdf');
    fs.writeFileSync(pdfPath, buildPdf([[{ text: 'Cover', x: 72, y: 720, size: 12 }], []]));

    const pages = await new PdfJsReader().readPages(pdfPath);

    expect(pages).toEqual(['Cover\n', '']);
  });

  test('should reject a missing file', async () => {
    await expect(new PdfJsReader().readPages(path.join(tmpDir, 'absent.pdf'))).rejects.toThrow('ENOENT');
  });
});
