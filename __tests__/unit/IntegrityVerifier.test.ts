/**
 * Tests unitarios para src/engines/IntegrityVerifier.ts.
 */
import crypto from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import IntegrityVerifier, {
  assertAlgorithm,
  isSupportedAlgorithm,
} from '../../src/engines/IntegrityVerifier';
import { IntegrityMismatchError, UnsupportedAlgorithmError } from '../../src/engines/errors';

describe('IntegrityVerifier', () => {
  const content = Buffer.from('contenido de prueba para verificar'.repeat(50), 'utf8');
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'verifier-'));
    filePath = path.join(testDir, 'file.bin');
    await fs.writeFile(filePath, content);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it.each(['md5', 'sha1', 'sha256', 'sha512'])('debe calcular %s igual que crypto', async algorithm => {
    const expected = crypto.createHash(algorithm).update(content).digest('hex');
    const handle = await fs.open(filePath, 'r');
    try {
      // buffer menor que el archivo para recorrerlo en varias lecturas
      const verifier = new IntegrityVerifier(64);
      expect(await verifier.calculateHash(handle, algorithm)).toBe(expected);
    } finally {
      await handle.close();
    }
  });

  it('debe reportar progreso hasta 1', async () => {
    const handle = await fs.open(filePath, 'r');
    const progress: number[] = [];
    try {
      await new IntegrityVerifier(1024).calculateHash(handle, 'sha256', p => progress.push(p));
    } finally {
      await handle.close();
    }
    expect(progress[progress.length - 1]).toBe(1);
  });

  it('debe aceptar el digest esperado sin distinguir mayúsculas', async () => {
    const expected = crypto.createHash('sha256').update(content).digest('hex').toUpperCase();
    const handle = await fs.open(filePath, 'r');
    try {
      await expect(
        new IntegrityVerifier().verify(handle, filePath, 'sha256', expected)
      ).resolves.toBeUndefined();
    } finally {
      await handle.close();
    }
  });

  it('debe lanzar IntegrityMismatchError con ambos digests si no coincide', async () => {
    const computed = crypto.createHash('md5').update(content).digest('hex');
    const handle = await fs.open(filePath, 'r');
    try {
      await expect(
        new IntegrityVerifier().verify(handle, filePath, 'md5', '00ff')
      ).rejects.toMatchObject({ computed, expected: '00ff', filePath, code: 'INTEGRITY_MISMATCH' });
    } finally {
      await handle.close();
    }
  });

  it('debe rechazar algoritmos no soportados', async () => {
    expect(isSupportedAlgorithm('sha256')).toBe(true);
    expect(isSupportedAlgorithm('crc32')).toBe(false);
    expect(assertAlgorithm(' SHA1 ')).toBe('sha1');
    expect(() => assertAlgorithm('crc32')).toThrow(UnsupportedAlgorithmError);

    const handle = await fs.open(filePath, 'r');
    try {
      await expect(new IntegrityVerifier().calculateHash(handle, 'whirlpool')).rejects.toBeInstanceOf(
        UnsupportedAlgorithmError
      );
    } finally {
      await handle.close();
    }
  });

  it('IntegrityMismatchError debe indicar que el contenido no es confiable', () => {
    const error = new IntegrityMismatchError('/tmp/x', 'aa', 'bb');
    expect(error.message).toContain('no es confiable');
  });
});
