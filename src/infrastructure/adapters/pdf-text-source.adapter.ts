import { Injectable, Logger } from '@nestjs/common';
import PDFParser from 'pdf2json';
import {
  BulletinDocument,
  BulletinTextSourcePort,
} from '../../domain/ports/bulletin-text-source.port';
import { TextSourceError } from '../../domain/errors/text-source.error';

/** Lo que se usa de la salida de pdf2json */
interface ParsedPdf {
  Pages: Array<{
    Texts: Array<{ x: number; y: number; R: Array<{ T: string }> }>;
  }>;
}

interface PositionedText {
  x: number;
  y: number;
  text: string;
}

/** Dos textos a menos de esta distancia vertical (unidades pdf2json) son el mismo renglón */
const LINE_TOLERANCE = 0.3;

/** pdf2json no da el ancho confiable de un texto; se estima por carácter */
const CHAR_WIDTH = 0.25;

/** Hueco horizontal a partir del cual dos textos son celdas distintas */
const COLUMN_GAP = 0.8;

/**
 * Adaptador que convierte el PDF del boletín a texto plano con pdf2json.
 *
 * 1. Parsea el buffer (sin tocar disco)
 * 2. Por página, junta los fragmentos de texto en renglones según su posición Y
 * 3. Dentro de un renglón, separa en celdas donde hay un hueco de columna
 * 4. Emite una línea por celda, de arriba hacia abajo y de izquierda a derecha,
 *    con las páginas en orden
 *
 * Una fila de tabla ("Octubre  123 251  358 602 …") queda así como la etiqueta
 * sola en su línea y una cifra por línea.
 */
@Injectable()
export class PdfTextSourceAdapter implements BulletinTextSourcePort {
  private readonly logger = new Logger(PdfTextSourceAdapter.name);

  async readText(document: BulletinDocument): Promise<string> {
    const startTime = Date.now();
    const output = await this.parse(document);

    const lines = output.Pages.flatMap((page) =>
      this.pageToLines(
        page.Texts.flatMap((block) =>
          block.R.map((run) => ({ x: block.x, y: block.y, text: this.decode(run.T) })),
        ),
      ),
    );

    if (lines.length === 0) {
      throw new TextSourceError(document.fileName, 'el PDF no tiene texto extraíble (¿escaneado?)');
    }

    this.logger.log(
      `📄 ${document.fileName}: ${output.Pages.length} páginas, ${lines.length} renglones (${Date.now() - startTime}ms)`,
    );

    return lines.join('\n');
  }

  // ──────────────────────────────────────────────────────────

  private parse(document: BulletinDocument): Promise<ParsedPdf> {
    return new Promise((resolve, reject) => {
      const parser = new PDFParser();

      parser.on('pdfParser_dataError', (errData) => {
        const reason = errData instanceof Error ? errData : errData.parserError;
        this.logger.error(`❌ pdf2json falló con ${document.fileName}: ${reason}`);
        reject(new TextSourceError(document.fileName, String(reason)));
      });

      parser.on('pdfParser_dataReady', (pdfData) => resolve(pdfData));

      parser.parseBuffer(document.data);
    });
  }

  /** Agrupa fragmentos por Y (con tolerancia) y devuelve las celdas de la página en orden */
  private pageToLines(items: PositionedText[]): string[] {
    const rows: Array<{ y: number; items: PositionedText[] }> = [];

    for (const item of items) {
      if (!item.text.trim()) continue;
      const row = rows.find((r) => Math.abs(r.y - item.y) <= LINE_TOLERANCE);
      if (row) {
        row.items.push(item);
      } else {
        rows.push({ y: item.y, items: [item] });
      }
    }

    return rows
      .sort((a, b) => a.y - b.y)
      .flatMap((row) => this.rowToCells(row.items.sort((a, b) => a.x - b.x)));
  }

  /** Une fragmentos contiguos; un hueco mayor a COLUMN_GAP abre otra celda */
  private rowToCells(items: PositionedText[]): string[] {
    const cells: string[][] = [];
    let cellEnd = Number.NEGATIVE_INFINITY;

    for (const item of items) {
      const text = item.text.trim();
      const current = cells[cells.length - 1];
      if (current && item.x - cellEnd <= COLUMN_GAP) {
        current.push(text);
      } else {
        cells.push([text]);
      }
      cellEnd = item.x + item.text.length * CHAR_WIDTH;
    }

    return cells.map((cell) => cell.join(' '));
  }

  /** pdf2json entrega el texto URI-encoded; un "%" suelto no es secuencia válida */
  private decode(raw: string): string {
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
}
