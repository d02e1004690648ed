import { readFileSync } from 'node:fs';
import path from 'node:path';
import { escapeHtml } from './utils';

const WEB_DIR = path.resolve(__dirname, '..', 'web');

export type PageName = 'index' | 'about' | 'register' | 'login';
export type AssetName = 'app.css' | 'logo.svg';

const files = new Map<string, string>();

function readWebFile(file: string): string {
  let content = files.get(file);
  if (content === undefined) {
    content = readFileSync(path.join(WEB_DIR, file), 'utf8');
    files.set(file, content);
  }
  return content;
}

export function renderPage(name: PageName, message?: string): string {
  const alert = message ? `<p class="alert" role="alert">${escapeHtml(message)}</p>` : '';
  return readWebFile(`${name}.html`).replace('{{message}}', alert);
}

export function readAsset(name: AssetName): string {
  return readWebFile(name);
}
