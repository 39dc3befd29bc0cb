/**
 * Tests for reading documents from files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  documentFileType,
  loadDocumentsFromDirectory,
  loadDocumentsFromFile,
  loadRawDocumentFile,
  parseDocuments,
} from '../loader.js';
import { InvalidArgumentError, InvalidDocumentError } from '../../errors/types.js';
import { DefaultJsonCodec } from '../../transport/codec.js';

const encoder = new TextEncoder();

function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

describe('documentFileType', () => {
  it('should read the format from the extension', () => {
    expect(documentFileType('/data/movies.json')).toBe('json');
    expect(documentFileType('movies.NDJSON')).toBe('ndjson');
    expect(documentFileType('movies.csv')).toBe('csv');
  });

  it('should reject other extensions', () => {
    expect(() => documentFileType('movies.txt')).toThrow('File must be a json, ndjson, or csv file');
  });
});

describe('parseDocuments', () => {
  describe('json', () => {
    it('should read a list of objects', () => {
      expect(parseDocuments(bytes('[{"id":1,"title":"Carol"},{"id":2}]'), 'json')).toEqual([
        { id: 1, title: 'Carol' },
        { id: 2 },
      ]);
    });

    it('should decode through the given codec', () => {
      const codec = new DefaultJsonCodec({
        reviver: (key, value) => (key === 'year' && typeof value === 'number' ? String(value) : value),
      });

      expect(parseDocuments(bytes('[{"id":1,"year":2015}]'), 'json', { codec })).toEqual([
        { id: 1, year: '2015' },
      ]);
    });

    it('should require a list', () => {
      expect(() => parseDocuments(bytes('{"id":1}'), 'json')).toThrow('Documents must be in a list');
    });

    it('should require every item to be an object', () => {
      expect(() => parseDocuments(bytes('[{"id":1},2]'), 'json')).toThrow(
        'Document at index 1 is not a JSON object'
      );
    });

    it('should wrap parse failures', () => {
      expect(() => parseDocuments(bytes('[{"id":'), 'json')).toThrow(InvalidDocumentError);
    });
  });

  describe('ndjson', () => {
    it('should read one document per line and skip blank lines', () => {
      expect(parseDocuments(bytes('{"id":1}\r\n\n{"id":2}\n'), 'ndjson')).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('should name the line that is not an object', () => {
      expect(() => parseDocuments(bytes('{"id":1}\n[1]\n'), 'ndjson')).toThrow('Line 2 is not a JSON object');
    });
  });

  describe('csv', () => {
    it('should use the header row as field names', () => {
      const content = bytes('id,title,genre\n1,Carol,drama\n2,Heat,crime\n');

      expect(parseDocuments(content, 'csv')).toEqual([
        { id: '1', title: 'Carol', genre: 'drama' },
        { id: '2', title: 'Heat', genre: 'crime' },
      ]);
    });

    it('should honour a custom delimiter', () => {
      expect(parseDocuments(bytes('id;title\n1;Carol, the film\n'), 'csv', { csvDelimiter: ';' })).toEqual([
        { id: '1', title: 'Carol, the film' },
      ]);
    });

    it('should reject a delimiter that is not one ascii character', () => {
      expect(() => parseDocuments(bytes('id\n1\n'), 'csv', { csvDelimiter: '::' })).toThrow(
        'csvDelimiter must be a single ascii character'
      );
      expect(() => parseDocuments(bytes('id\n1\n'), 'csv', { csvDelimiter: 'é' })).toThrow(InvalidArgumentError);
    });

    it('should reject rows with a different number of fields', () => {
      expect(() => parseDocuments(bytes('id,title\n1\n'), 'csv')).toThrow(InvalidDocumentError);
    });
  });

  it('should reject a delimiter for other formats', () => {
    expect(() => parseDocuments(bytes('[]'), 'json', { csvDelimiter: ';' })).toThrow(
      'csvDelimiter can only be used with csv files'
    );
  });
});

describe('file loading', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'search-docs-'));
    await writeFile(join(directory, 'b.json'), '[{"id":2}]');
    await writeFile(join(directory, 'a.json'), '[{"id":1}]');
    await writeFile(join(directory, 'c.csv'), 'id,title\n3,Heat\n');
    await writeFile(join(directory, 'notes.txt'), 'not documents');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('loadDocumentsFromFile', () => {
    it('should read a file by its extension', async () => {
      await expect(loadDocumentsFromFile(join(directory, 'c.csv'))).resolves.toEqual([{ id: '3', title: 'Heat' }]);
    });

    it('should report a missing file', async () => {
      const path = join(directory, 'missing.json');

      await expect(loadDocumentsFromFile(path)).rejects.toThrow(`No file found at ${path}`);
    });
  });

  describe('loadDocumentsFromDirectory', () => {
    it('should read json files in name order', async () => {
      const files = await loadDocumentsFromDirectory(directory);

      expect(files).toEqual([
        { path: join(directory, 'a.json'), documents: [{ id: 1 }] },
        { path: join(directory, 'b.json'), documents: [{ id: 2 }] },
      ]);
    });

    it('should read only the requested format', async () => {
      const files = await loadDocumentsFromDirectory(directory, { documentType: 'csv' });

      expect(files.map((f) => f.documents)).toEqual([[{ id: '3', title: 'Heat' }]]);
    });

    it('should fail when no file matches', async () => {
      await expect(loadDocumentsFromDirectory(directory, { documentType: 'ndjson' })).rejects.toThrow(
        `No ndjson files found in ${directory}`
      );
    });

    it('should report a missing directory', async () => {
      const missing = join(directory, 'missing');

      await expect(loadDocumentsFromDirectory(missing)).rejects.toThrow(`No directory found at ${missing}`);
    });
  });

  describe('loadRawDocumentFile', () => {
    it('should return the bytes and format of a csv file', async () => {
      const raw = await loadRawDocumentFile(join(directory, 'c.csv'), ';');

      expect(raw.type).toBe('csv');
      expect(new TextDecoder().decode(raw.content)).toBe('id,title\n3,Heat\n');
    });

    it('should refuse json files', async () => {
      await expect(loadRawDocumentFile(join(directory, 'a.json'))).rejects.toThrow(
        'Only csv and ndjson files can be sent as raw files'
      );
    });

    it('should refuse a delimiter for ndjson files', async () => {
      await writeFile(join(directory, 'd.ndjson'), '{"id":4}\n');

      await expect(loadRawDocumentFile(join(directory, 'd.ndjson'), ';')).rejects.toThrow(
        'csvDelimiter can only be used with csv files'
      );
    });
  });
});
