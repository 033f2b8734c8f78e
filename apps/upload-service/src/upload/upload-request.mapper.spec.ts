import { Readable } from 'stream';
import { parseTags, toUploadRequest } from './upload-request.mapper';

function multerFile(originalname: string, content: string): Express.Multer.File {
  const buffer = Buffer.from(content);
  return {
    fieldname: 'file',
    originalname,
    encoding: '7bit',
    mimetype: 'text/plain',
    size: buffer.length,
    buffer,
    stream: Readable.from(buffer),
    destination: '',
    filename: '',
    path: '',
  };
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('parseTags', () => {
  it('should split a comma-separated value', () => {
    expect(parseTags('Hans,Wurst')).toEqual(['Hans', 'Wurst']);
  });

  it('should merge repeated fields and trim entries', () => {
    expect(parseTags([' Hans ', 'Wurst, Brot'])).toEqual(['Hans', 'Wurst', 'Brot']);
  });

  it('should drop empty entries', () => {
    expect(parseTags(',Hans,,')).toEqual(['Hans']);
    expect(parseTags('')).toEqual([]);
    expect(parseTags(undefined)).toEqual([]);
  });

  it('should ignore values that are not strings', () => {
    expect(parseTags({ a: 'Hans' })).toEqual([]);
    expect(parseTags(7)).toEqual([]);
    expect(parseTags(['Hans', { b: 'Wurst' }, 3])).toEqual(['Hans']);
  });
});

describe('toUploadRequest', () => {
  it('should map form fields and the uploaded file', async () => {
    const file = multerFile('persons.txt', 'Max;Mustermann;2014/01/01\n');

    const request = toUploadRequest(
      { title: 'Title', tags: 'Hans,Wurst', description: 'Description' },
      file,
    );

    expect(request).toMatchObject({
      title: 'Title',
      tags: ['Hans', 'Wurst'],
      description: 'Description',
      fileName: 'persons.txt',
      fileSize: 26,
    });
    expect(request.fileContent).not.toBeNull();
    if (request.fileContent) {
      await expect(readAll(request.fileContent)).resolves.toBe('Max;Mustermann;2014/01/01\n');
    }
  });

  it('should use the first value of a repeated text field', () => {
    const request = toUploadRequest({ title: ['First', 'Second'] }, undefined);

    expect(request.title).toBe('First');
  });

  it('should treat nested and non-string fields as missing', () => {
    const request = toUploadRequest(
      { title: { x: 'Title' }, tags: 7, description: ['Description'] },
      undefined,
    );

    expect(request.title).toBe('');
    expect(request.tags).toEqual([]);
    expect(request.description).toBe('Description');
  });

  it('should treat a repeated field whose first value is not a string as missing', () => {
    expect(toUploadRequest({ title: [5, 'Title'] }, undefined).title).toBe('');
  });

  it('should produce empty fields and no content without a form', () => {
    expect(toUploadRequest(undefined, undefined)).toEqual({
      title: '',
      tags: [],
      description: '',
      fileName: '',
      fileSize: 0,
      fileContent: null,
    });
  });
});
