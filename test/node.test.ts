import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pathToFileURL } from 'node:url';
import { hash, md5File, md5Stream, toHex, type DigestProgressEvent } from '../src/node/index.js';

const encoder = new TextEncoder();

async function withTempFile(data: Uint8Array, run: (filePath: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), 'md5-engine-'));
  const filePath = path.join(dir, 'input.bin');
  try {
    await writeFile(filePath, data);
    await run(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function patterned(length: number): Uint8Array {
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i += 1) {
    out[i] = (i * 73 + 11) & 0xff;
  }
  return out;
}

test('md5File matches the in-memory digest for any chunk size', async () => {
  const data = patterned(5000);
  await withTempFile(data, async (filePath) => {
    const expected = hash(data);
    for (const chunkSize of [1, 7, 64, 1000, undefined]) {
      assert.deepEqual(await md5File(filePath, { chunkSize }), expected, `chunkSize=${chunkSize}`);
    }
    assert.deepEqual(await md5File(pathToFileURL(filePath)), expected);
  });
});

test('md5File hashes an empty file', async () => {
  await withTempFile(new Uint8Array(0), async (filePath) => {
    assert.equal(toHex(await md5File(filePath)), 'd41d8cd98f00b204e9800998ecf8427e');
  });
});

test('md5File reports progress per chunk and a final total', async () => {
  await withTempFile(encoder.encode('0123456789'), async (filePath) => {
    const events: DigestProgressEvent[] = [];
    await md5File(filePath, {
      chunkSize: 4,
      progressChunkInterval: 1,
      onProgress: (event) => events.push(event)
    });
    assert.deepEqual(
      events.map((event) => event.bytesIn),
      [4n, 8n, 10n, 10n]
    );
    assert.ok(events.every((event) => event.source === filePath));
  });
});

test('md5File stops between chunks when aborted', async () => {
  await withTempFile(patterned(64), async (filePath) => {
    const controller = new AbortController();
    const seen: bigint[] = [];
    await assert.rejects(
      md5File(filePath, {
        chunkSize: 4,
        progressChunkInterval: 1,
        signal: controller.signal,
        onProgress: (event) => {
          seen.push(event.bytesIn);
          controller.abort(new Error('stop hashing'));
        }
      }),
      /stop hashing/
    );
    assert.deepEqual(seen, [4n]);
  });
});

test('md5File rejects immediately with an already-aborted signal', async () => {
  await assert.rejects(md5File('/does/not/matter', { signal: AbortSignal.abort() }), { name: 'AbortError' });
});

test('md5File propagates file system errors', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'md5-engine-'));
  try {
    await assert.rejects(md5File(path.join(dir, 'missing.bin')), { code: 'ENOENT' });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('md5Stream accepts async iterables, Node readables and web streams', async () => {
  const chunks = [encoder.encode('Hello'), encoder.encode(' M'), encoder.encode('D5')];
  const expected = 'e5dadf6524624f79c3127e247f04b548';

  async function* generate(): AsyncGenerator<Uint8Array> {
    yield* chunks;
  }
  assert.equal(toHex(await md5Stream(generate())), expected);
  assert.equal(toHex(await md5Stream(Readable.from(chunks))), expected);

  const web = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    }
  });
  const events: DigestProgressEvent[] = [];
  assert.equal(toHex(await md5Stream(web, { onProgress: (event) => events.push(event) })), expected);
  assert.equal(events.at(-1)?.bytesIn, 9n);
  assert.equal(events.at(-1)?.source, 'stream');
});

test('md5Stream honours abort between chunks', async () => {
  const controller = new AbortController();
  async function* generate(): AsyncGenerator<Uint8Array> {
    yield encoder.encode('first');
    controller.abort(new Error('halt'));
    yield encoder.encode('second');
  }
  await assert.rejects(md5Stream(generate(), { signal: controller.signal }), /halt/);
});
