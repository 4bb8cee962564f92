/**
 * Tests unitarios para src/engines/ChunkStore.ts.
 *
 * Cubre: layout de rutas, listado de chunks y conservación o descarte de chunks según el
 * plan registrado.
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import ChunkStore from '../../src/engines/ChunkStore';

describe('ChunkStore', () => {
  let testDir: string;
  let store: ChunkStore;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'chunk-store-'));
    store = new ChunkStore(testDir, 'archivo.iso');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('debe derivar las rutas temporales del destino', () => {
    expect(store.destinationPath).toBe(path.join(testDir, 'archivo.iso'));
    expect(store.getChunkDir()).toBe(path.join(testDir, 'archivo.iso.chunks'));
    expect(store.getChunkPath(7)).toBe(path.join(testDir, 'archivo.iso.chunks', '7'));
    expect(store.getPartialPath()).toBe(path.join(testDir, 'archivo.iso.part'));
  });

  it('debe listar solo los archivos de chunk, ordenados por índice', async () => {
    await store.preparePlan({ totalLength: 30, rangeCount: 3, changeToken: '' });
    await fs.writeFile(store.getChunkPath(10), 'bbbb');
    await fs.writeFile(store.getChunkPath(2), 'aa');

    const chunks = await store.listChunks();

    expect(chunks).toEqual([
      { index: 2, path: store.getChunkPath(2), size: 2 },
      { index: 10, path: store.getChunkPath(10), size: 4 },
    ]);
  });

  it('debe devolver una lista vacía si el directorio no existe', async () => {
    expect(await store.listChunks()).toEqual([]);
    expect(await store.describeLeftovers()).toBeNull();
  });

  it('debe conservar los chunks cuando el plan no cambia', async () => {
    const plan = { totalLength: 100, rangeCount: 4, changeToken: 'v1' };
    await store.preparePlan(plan);
    await fs.writeFile(store.getChunkPath(0), 'abc');

    await store.preparePlan(plan);

    expect(await fs.readFile(store.getChunkPath(0), 'utf8')).toBe('abc');
    expect(await store.readPlan()).toEqual(plan);
  });

  it('debe descartar los chunks si cambia la concurrencia o el ETag', async () => {
    await store.preparePlan({ totalLength: 100, rangeCount: 4, changeToken: 'v1' });
    await fs.writeFile(store.getChunkPath(0), 'abc');

    await store.preparePlan({ totalLength: 100, rangeCount: 4, changeToken: 'v2' });

    expect(await store.listChunks()).toEqual([]);
    expect(await store.readPlan()).toEqual({ totalLength: 100, rangeCount: 4, changeToken: 'v2' });
  });

  it('debe adoptar chunks existentes sin plan registrado', async () => {
    await store.createChunkDir();
    await fs.writeFile(store.getChunkPath(1), 'xyz');

    await store.preparePlan({ totalLength: 100, rangeCount: 2, changeToken: '' });

    expect(await fs.readFile(store.getChunkPath(1), 'utf8')).toBe('xyz');
    expect(await store.describeLeftovers()).toBe('1 chunks (3 bytes), .part: no');
  });
});
