import * as fs from 'fs';
import * as path from 'path';

/** Lee un boletín de ejemplo de este directorio */
export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, name), 'utf8');
}
