/**
 * Tests unitarios para src/engines/ChunkFetcher.ts.
 *
 * Cubre: descarga de un rango nuevo, reanudación desde los bytes en disco, chunk completo
 * sin petición, archivo temporal mayor que el rango, errores HTTP, Range ignorado por el
 * servidor, cuerpo truncado y longitud desconocida.
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import ChunkFetcher from '../../src/engines/ChunkFetcher';
import { UpstreamError } from '../../src/engines/errors';
import { ERRORS } from '../../src/constants/errors';
import type { ProgressEvent, ProgressSink } from '../../src/engines/types';
import { FakeTransport, makeContent } from '../helpers/FakeTransport';

class RecordingSink implements ProgressSink {
  readonly events: ProgressEvent[] = [];
  closed = 0;
  report(event: ProgressEvent): void {
    this.events.push(event);
  }
  close(): void {
    this.closed++;
  }
}

const RESOURCE_URL = 'https://files.example.test/data.bin';

describe('ChunkFetcher', () => {
  const content = makeContent(1000);
  let testDir: string;
  let tempFilePath: string;
  let sink: RecordingSink;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chunk-fetcher-'));
    tempFilePath = path.join(testDir, '1');
    sink = new RecordingSink();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('debe descargar un rango completo y emitir un evento por write', async () => {
    const transport = new FakeTransport(content, { pieceSize: 100 });
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 1, start: 200, end: 500 },
      total: 1000,
      sink,
    });

    expect(result).toEqual({ index: 1, resumedBytes: 0, transferredBytes: 300, skipped: false });
    expect(transport.rangeHeaders).toEqual(['bytes=200-499']);
    expect(sink.events).toEqual([
      { total: 1000, writtenBytes: 100, fromDisk: false },
      { total: 1000, writtenBytes: 100, fromDisk: false },
      { total: 1000, writtenBytes: 100, fromDisk: false },
    ]);
    expect(await fs.readFile(tempFilePath)).toEqual(content.subarray(200, 500));
  });

  it('debe reanudar pidiendo solo la cola que falta', async () => {
    await fs.writeFile(tempFilePath, content.subarray(200, 250));
    const transport = new FakeTransport(content, { pieceSize: 100 });
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 1, start: 200, end: 500 },
      total: 1000,
      sink,
    });

    expect(result).toEqual({ index: 1, resumedBytes: 50, transferredBytes: 250, skipped: false });
    expect(transport.rangeHeaders).toEqual(['bytes=250-499']);
    expect(sink.events).toEqual([
      { total: 1000, writtenBytes: 50, fromDisk: true },
      { total: 1000, writtenBytes: 100, fromDisk: false },
      { total: 1000, writtenBytes: 100, fromDisk: false },
      { total: 1000, writtenBytes: 50, fromDisk: false },
    ]);
    expect(await fs.readFile(tempFilePath)).toEqual(content.subarray(200, 500));
  });

  it('no debe hacer ninguna petición si el chunk ya está completo', async () => {
    await fs.writeFile(tempFilePath, content.subarray(200, 500));
    const transport = new FakeTransport(content);
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 1, start: 200, end: 500 },
      total: 1000,
      sink,
    });

    expect(result).toEqual({ index: 1, resumedBytes: 300, transferredBytes: 0, skipped: true });
    expect(transport.getCount).toBe(0);
    expect(sink.events).toEqual([{ total: 1000, writtenBytes: 300, fromDisk: true }]);
  });

  it('debe reiniciar el chunk si el archivo temporal es mayor que el rango', async () => {
    await fs.writeFile(tempFilePath, Buffer.alloc(400, 0xee));
    const transport = new FakeTransport(content);
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 1, start: 200, end: 500 },
      total: 1000,
      sink,
    });

    expect(result.resumedBytes).toBe(0);
    expect(transport.rangeHeaders).toEqual(['bytes=200-499']);
    expect(await fs.readFile(tempFilePath)).toEqual(content.subarray(200, 500));
  });

  it('debe lanzar UpstreamError con el status ante una respuesta no 2xx', async () => {
    const transport = new FakeTransport(content, { failStatusFor: () => 503 });
    const fetcher = new ChunkFetcher(transport);

    const promise = fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 0, start: 0, end: 1000 },
      total: 1000,
      sink,
    });

    await expect(promise).rejects.toBeInstanceOf(UpstreamError);
    await expect(promise).rejects.toMatchObject({ status: 503, code: 'UPSTREAM_ERROR' });
    expect(sink.events).toEqual([]);
  });

  it('debe fallar si el servidor ignora Range en un rango que no empieza en 0', async () => {
    const transport = new FakeTransport(content, { acceptRanges: false });
    const fetcher = new ChunkFetcher(transport);

    await expect(
      fetcher.fetchRange({
        url: RESOURCE_URL,
        tempFilePath,
        range: { index: 1, start: 200, end: 500 },
        total: 1000,
        sink,
      })
    ).rejects.toThrow(ERRORS.UPSTREAM.RANGE_IGNORED);
  });

  it('debe reiniciar desde 0 si el servidor ignora Range al reanudar el primer rango', async () => {
    await fs.writeFile(tempFilePath, content.subarray(0, 100));
    const transport = new FakeTransport(content, { acceptRanges: false, pieceSize: 1000 });
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 0, start: 0, end: 1000 },
      total: 1000,
      sink,
    });

    expect(result).toEqual({ index: 0, resumedBytes: 0, transferredBytes: 1000, skipped: false });
    expect(sink.events).toEqual([{ total: 1000, writtenBytes: 1000, fromDisk: false }]);
    expect(await fs.readFile(tempFilePath)).toEqual(content);
  });

  it('debe fallar con BODY_TRUNCATED y conservar lo recibido si el cuerpo termina antes', async () => {
    const transport = new FakeTransport(content, { truncateBodyAt: 100 });
    const fetcher = new ChunkFetcher(transport);

    await expect(
      fetcher.fetchRange({
        url: RESOURCE_URL,
        tempFilePath,
        range: { index: 0, start: 0, end: 300 },
        total: 1000,
        sink,
      })
    ).rejects.toThrow(ERRORS.UPSTREAM.BODY_TRUNCATED);
    expect((await fs.stat(tempFilePath)).size).toBe(100);
  });

  it('debe copiar el cuerpo completo con longitud desconocida y total -1', async () => {
    const transport = new FakeTransport(content, { pieceSize: 400 });
    const fetcher = new ChunkFetcher(transport);

    const result = await fetcher.fetchRange({
      url: RESOURCE_URL,
      tempFilePath,
      range: { index: 0, start: 0, end: -1 },
      total: -1,
      sink,
    });

    expect(result.transferredBytes).toBe(1000);
    expect(transport.rangeHeaders).toEqual(['bytes=0-']);
    expect(sink.events.map(e => e.writtenBytes)).toEqual([400, 400, 200]);
    expect(sink.events.every(e => e.total === -1)).toBe(true);
    expect(await fs.readFile(tempFilePath)).toEqual(content);
  });
});
