const BOUNDARY = '----event-records-test-boundary';

export interface MultipartRequest {
  payload: Buffer;
  headers: { 'content-type': string };
}

export interface TestFile {
  filename: string;
  contentType: string;
  content: Buffer;
}

function finish(parts: Buffer[]): MultipartRequest {
  return {
    payload: Buffer.concat([...parts, Buffer.from(`--${BOUNDARY}--\r\n`)]),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

/**
 * multipart/form-data body with a single file part named `file`.
 */
export function multipartFile(file: TestFile): MultipartRequest {
  const head =
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="file"; filename="${file.filename}"\r\n` +
    `Content-Type: ${file.contentType}\r\n\r\n`;

  return finish([Buffer.from(head), file.content, Buffer.from('\r\n')]);
}

/**
 * multipart/form-data body with a text field and no file part.
 */
export function multipartField(name: string, value: string): MultipartRequest {
  const part =
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="${name}"\r\n\r\n` +
    `${value}\r\n`;

  return finish([Buffer.from(part)]);
}
