import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { DocumentReaderTool } from '../../src/features/DocumentReaderTool';
import type { DocumentReaderPort, DocumentText } from '../../src/ports/documents/DocumentReaderPort';

function makeReader(read: (filePath: string) => Promise<DocumentText>) {
  const reader: DocumentReaderPort & { read: jest.Mock } = {
    supports: (filePath: string) => filePath.endsWith('.txt'),
    read: jest.fn(read),
  };
  return reader;
}

describe('DocumentReaderTool', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'toolchat-docs-'));
    file = path.join(dir, 'notes.txt');
    writeFileSync(file, 'ignored by the fake reader');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('returns the document text with its format', async () => {
    const reader = makeReader(async () => ({ format: 'text', text: 'hello world' }));
    const res = await new DocumentReaderTool(reader).exec({ file_path: file });

    expect(reader.read).toHaveBeenCalledWith(file);
    expect(res).toEqual({
      status: 'success',
      file_path: file,
      file_name: 'notes.txt',
      format: 'text',
      content: 'hello world',
      truncated: false,
    });
  });

  test('truncates long documents', async () => {
    const reader = makeReader(async () => ({ format: 'text', text: 'abcdefghij' }));
    const res = await new DocumentReaderTool(reader, { maxChars: 4 }).exec({ file_path: file });
    expect(res.content).toBe('abcd');
    expect(res.truncated).toBe(true);
  });

  test('missing path and missing file are errors', async () => {
    const tool = new DocumentReaderTool(makeReader(async () => ({ format: 'text', text: '' })));
    await expect(tool.exec({})).resolves.toEqual({ status: 'error', message: 'file_path is required' });

    const missing = path.join(dir, 'gone.txt');
    await expect(tool.exec({ file_path: missing })).resolves.toEqual({
      status: 'error',
      message: `File not found: ${missing}`,
      file_path: missing,
    });
  });

  test('reader failures become an error result', async () => {
    const tool = new DocumentReaderTool(
      makeReader(async () => {
        throw new Error('Unsupported document type ".txt"');
      })
    );
    await expect(tool.exec({ file_path: file })).resolves.toEqual({
      status: 'error',
      message: 'Error reading document: Unsupported document type ".txt"',
      file_path: file,
      file_name: 'notes.txt',
    });
  });

  test('supports delegates to the reader', () => {
    const tool = new DocumentReaderTool(makeReader(async () => ({ format: 'text', text: '' })));
    expect(tool.supports('a.txt')).toBe(true);
    expect(tool.supports('a.exe')).toBe(false);
  });
});
