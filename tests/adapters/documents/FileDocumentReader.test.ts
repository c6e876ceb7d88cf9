import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import { FileDocumentReader, formatForPath } from '../../../src/adapters/documents/FileDocumentReader';

const WORD_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

async function docxBuffer(paragraphs: string[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>'
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
      '</Relationships>'
  );
  const body = paragraphs.map((text) => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`).join('');
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8"?><w:document xmlns:w="${WORD_NS}"><w:body>${body}</w:body></w:document>`
  );
  return zip.generateAsync({ type: 'nodebuffer' });
}

/** A one-page PDF showing `text` in Helvetica, with a correct xref table. */
function pdfBuffer(text: string): Buffer {
  const content = `BT /F1 24 Tf 72 720 Td (${text}) Tj ET`;
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefAt = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return Buffer.from(pdf, 'latin1');
}

describe('FileDocumentReader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'toolchat-reader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('formatForPath goes by extension, ignoring case', () => {
    expect(formatForPath('a/b/Report.PDF')).toBe('pdf');
    expect(formatForPath('data.csv')).toBe('text');
    expect(formatForPath('deck.pptx')).toBe('presentation');
    expect(formatForPath('binary.exe')).toBeNull();
    expect(formatForPath('README')).toBeNull();
  });

  test('reads plain text trimmed', async () => {
    const file = path.join(dir, 'notes.md');
    writeFileSync(file, '\n# Notes\nline\n\n');
    await expect(new FileDocumentReader().read(file)).resolves.toEqual({ format: 'text', text: '# Notes\nline' });
  });

  test('reads html without scripts or styles', async () => {
    const file = path.join(dir, 'page.html');
    writeFileSync(file, '<html><style>p{}</style><body><p>Hello &amp; welcome</p><script>x()</script></body></html>');
    await expect(new FileDocumentReader().read(file)).resolves.toEqual({ format: 'html', text: 'Hello & welcome' });
  });

  test('reads every sheet of a workbook as csv', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['name', 'qty'], ['apple', 3]]), 'Fruit');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['total'], [3]]), 'Sum');
    const file = path.join(dir, 'stock.xlsx');
    XLSX.writeFile(workbook, file);

    await expect(new FileDocumentReader().read(file)).resolves.toEqual({
      format: 'spreadsheet',
      text: '## Sheet: Fruit\nname,qty\napple,3\n\n## Sheet: Sum\ntotal\n3',
    });
  });

  test('reads slide text in slide order', async () => {
    const zip = new JSZip();
    zip.file('ppt/slides/slide10.xml', '<p:sld><a:t>Tenth</a:t></p:sld>');
    zip.file('ppt/slides/slide2.xml', '<p:sld><a:t>Second</a:t><a:t>slide &amp; more</a:t></p:sld>');
    zip.file('ppt/slides/_rels/slide2.xml.rels', '<Relationships/>');
    const file = path.join(dir, 'deck.pptx');
    writeFileSync(file, await zip.generateAsync({ type: 'nodebuffer' }));

    await expect(new FileDocumentReader().read(file)).resolves.toEqual({
      format: 'presentation',
      text: '## Slide 2\nSecond slide & more\n\n## Slide 10\nTenth',
    });
  });

  test('reads the paragraphs of a word document', async () => {
    const file = path.join(dir, 'letter.docx');
    writeFileSync(file, await docxBuffer(['Hello DOCX']));

    await expect(new FileDocumentReader().read(file)).resolves.toEqual({ format: 'docx', text: 'Hello DOCX' });
  });

  test('reads the text of a pdf', async () => {
    const file = path.join(dir, 'paper.pdf');
    writeFileSync(file, pdfBuffer('Hello PDF'));

    await expect(new FileDocumentReader().read(file)).resolves.toEqual({ format: 'pdf', text: 'Hello PDF' });
  });

  test('uses reader overrides for binary formats', async () => {
    const pdf = jest.fn(async () => '  extracted pdf text  ');
    const reader = new FileDocumentReader({ pdf });
    await expect(reader.read('/docs/paper.pdf')).resolves.toEqual({ format: 'pdf', text: 'extracted pdf text' });
    expect(pdf).toHaveBeenCalledWith('/docs/paper.pdf');
  });

  test('unsupported extensions are rejected', async () => {
    const reader = new FileDocumentReader();
    expect(reader.supports('tool.exe')).toBe(false);
    await expect(reader.read('tool.exe')).rejects.toThrow('Unsupported document type ".exe"');
  });
});
