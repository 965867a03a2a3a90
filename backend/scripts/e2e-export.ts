/*
 Run an end-to-end export against a provided storefront URL.
 Usage:
   tsx scripts/e2e-export.ts "<appstore-or-playstore-url>" [--host http://localhost:3001] [--out .]
*/

import { writeFile } from 'fs/promises';
import path from 'path';

const args = process.argv.slice(2);
if (args.length < 1) {
  console.error('Usage: tsx scripts/e2e-export.ts "<appstore-or-playstore-url>" [--host http://localhost:3001] [--out .]');
  process.exit(1);
}

const flag = (name: string, fallback: string): string => {
  const index = args.findIndex(a => a === name);
  return index !== -1 && args[index + 1] ? args[index + 1] : fallback;
};

const urlArg = args[0];
const host = flag('--host', 'http://localhost:3001');
const outDir = flag('--out', '.');

async function main() {
  const startedAt = Date.now();
  const exportRes = await fetch(`${host}/api/export`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ url: urlArg })
  });

  if (!exportRes.ok) {
    const text = await exportRes.text().catch(() => '');
    throw new Error(`Export request failed: HTTP ${exportRes.status} ${exportRes.statusText} ${text}`);
  }

  const disposition = exportRes.headers.get('content-disposition') ?? '';
  const filename = /filename="?([^";]+)"?/.exec(disposition)?.[1] ?? 'reviews.csv';
  const content = await exportRes.text();
  const target = path.join(outDir, filename);
  await writeFile(target, content, 'utf-8');

  const rows = content.split('\n').filter(line => line.length > 0).length - 1;
  console.log(JSON.stringify({
    file: target,
    rows,
    seconds: Math.round((Date.now() - startedAt) / 1000)
  }, null, 2));
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
