import { PdfTextSourceAdapter } from './pdf-text-source.adapter';
import { TextSourceError } from '../../domain/errors/text-source.error';
import { buildExtractionConfig, extractMonthlyReport } from '../../application/extraction';

// pdf2json reemplazado por un parser que emite, de forma asíncrona, el JSON
// que viene en el buffer; "corrupt" y "encrypted" simulan sus dos formas de error
jest.mock('pdf2json', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');

  class MockPdfParser extends EventEmitter {
    parseBuffer(data: Buffer): void {
      const payload = data.toString('utf8');
      setImmediate(() => {
        if (payload === 'corrupt') {
          this.emit('pdfParser_dataError', { parserError: new Error('Invalid PDF structure') });
        } else if (payload === 'encrypted') {
          this.emit('pdfParser_dataError', new Error('Unsupported encryption'));
        } else {
          this.emit('pdfParser_dataReady', JSON.parse(payload));
        }
      });
    }
  }

  return { __esModule: true, default: MockPdfParser };
});

function pdfBuffer(pages: Array<Array<{ x: number; y: number; t: string }>>): Buffer {
  const output = {
    Pages: pages.map((texts) => ({
      Texts: texts.map(({ x, y, t }) => ({ x, y, R: [{ T: encodeURIComponent(t) }] })),
    })),
  };
  return Buffer.from(JSON.stringify(output), 'utf8');
}

describe('PdfTextSourceAdapter', () => {
  const adapter = new PdfTextSourceAdapter();

  it('arma una línea por celda y concatena las páginas en orden', async () => {
    const data = pdfBuffer([
      [
        { x: 5.2, y: 1.0, t: 'de noviembre de 2025' },
        { x: 2, y: 1.0, t: 'México, a 10' },
        { x: 9.5, y: 3.1, t: '4.6%' },
        { x: 2, y: 3.0, t: 'Octubre' },
        { x: 5, y: 3.2, t: '352 114' },
        { x: 7, y: 5.0, t: '   ' },
      ],
      [{ x: 2, y: 1.0, t: 'Fuente: INEGI' }],
    ]);

    const text = await adapter.readText({ fileName: 'raiavl_2025_11.pdf', data });

    expect(text).toBe(
      'México, a 10 de noviembre de 2025\nOctubre\n352 114\n4.6%\nFuente: INEGI',
    );
  });

  it('falla con TextSourceError cuando pdf2json no puede parsear', async () => {
    const read = adapter.readText({ fileName: 'roto.pdf', data: Buffer.from('corrupt') });

    await expect(read).rejects.toBeInstanceOf(TextSourceError);
    await expect(read).rejects.toThrow(
      'No se pudo leer el texto de "roto.pdf": Error: Invalid PDF structure',
    );
  });

  it('acepta el error de pdf2json también como Error simple', async () => {
    await expect(
      adapter.readText({ fileName: 'cifrado.pdf', data: Buffer.from('encrypted') }),
    ).rejects.toThrow('No se pudo leer el texto de "cifrado.pdf": Error: Unsupported encryption');
  });

  it('una tabla con la fila en un solo renglón llega completa al reporte', async () => {
    const columns = [8, 12, 16, 20, 24, 28];
    const row = (y: number, label: string, cells: string[]) => [
      { x: 2, y, t: label },
      ...cells.map((t, index) => ({ x: columns[index], y, t })),
    ];
    const footer = Array.from({ length: 10 }, (_, index) => ({ x: 2, y: 8 + index, t: 'Nota al pie.' }));

    const data = pdfBuffer([
      [
        { x: 2, y: 1, t: 'México, a 10 de noviembre de 2025' },
        { x: 2, y: 2, t: 'cifras de octubre de 2025' },
        ...row(4, 'Octubre', ['123 251', '358 602', '298 774', '128 930', '352 114', '301 567']),
        ...row(5, 'Enero-Octubre', ['1 150 320', '3 402 118', '2 879 401', '1 201 044', '3 301 122', '2 905 300']),
        { x: 2, y: 6, t: '1/ Cifras preliminares.' },
        { x: 2, y: 7, t: 'Fuente: INEGI.' },
        ...footer,
      ],
    ]);

    const text = await adapter.readText({ fileName: 'raiavl_2025_11.pdf', data });
    const report = extractMonthlyReport(text, 'raiavl_2025_11.pdf', buildExtractionConfig());

    expect(text.split('\n').slice(2, 9)).toEqual([
      'Octubre',
      '123 251',
      '358 602',
      '298 774',
      '128 930',
      '352 114',
      '301 567',
    ]);
    expect(report.periodKey).toBe('2025-10');
    expect(report.monthly).toEqual({ sales: 128930, production: 352114, exports: 301567 });
    expect(report.yearToDate).toEqual({ sales: 1201044, production: 3301122, exports: 2905300 });
    expect(report.warnings).toEqual([]);
  });

  it('falla cuando el PDF no tiene texto (p. ej. escaneado)', async () => {
    const data = pdfBuffer([[], [{ x: 1, y: 1, t: ' ' }]]);

    await expect(adapter.readText({ fileName: 'escaneado.pdf', data })).rejects.toThrow(
      'No se pudo leer el texto de "escaneado.pdf": el PDF no tiene texto extraíble (¿escaneado?)',
    );
  });
});
