import { scanMonthlyBlock, scanNumericBlock, scanYearToDateBlock } from './numeric-block-scanner';

const CONFIG = {
  monthlyMinMagnitude: 1000,
  ytdMinMagnitude: 10000,
  scanWindow: 15,
  trailingGuard: 10,
};

/** Renglones de relleno para que la etiqueta no quede en el pie del documento */
const FOOTER = Array<string>(12).fill('');

describe('NumericBlockScanner', () => {
  describe('scanMonthlyBlock', () => {
    it('descarta cifras chicas y toma los índices 3, 4 y 5', () => {
      const lines = [
        'Cuadro 1',
        'Octubre',
        '5',
        '12',
        '987654',
        '2025',
        '450123',
        '3',
        '201044',
        '455000',
        '300500',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.labelLine).toBe(1);
      expect(scan.tokens).toEqual([987654, 2025, 450123, 201044, 455000, 300500]);
      expect(scan.triple).toEqual({ sales: 201044, production: 455000, exports: 300500 });
      expect(scan.warnings).toEqual([]);
    });

    it('cierra el bloque en "Enero-Octubre" sin leer los renglones siguientes', () => {
      const lines = [
        'Octubre',
        '111111',
        '222222',
        '333333',
        'Enero-Octubre',
        '444444',
        '555555',
        '666666',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('seeking-label');
      expect(scan.tokens).toEqual([111111, 222222, 333333]);
      expect(scan.triple).toEqual({ sales: 0, production: 0, exports: 0 });
      expect(scan.warnings).toEqual([
        'Tabla mensual: la etiqueta "Octubre" (renglón 1) tiene 3 cifras, se esperaban 6',
      ]);
    });

    it('lee las cifras del renglón que cierra el bloque', () => {
      const lines = [
        'Octubre',
        '123 251',
        '358 602',
        '298 774',
        '128 930',
        '352 114',
        '301 567 Enero-Octubre',
        '999 999',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.tokens).toEqual([123251, 358602, 298774, 128930, 352114, 301567]);
      expect(scan.triple).toEqual({ sales: 128930, production: 352114, exports: 301567 });
      expect(scan.warnings).toEqual([]);
    });

    it('lee los 15 renglones siguientes a la etiqueta', () => {
      const lines = [
        'Octubre',
        ...Array<string>(9).fill(''),
        '100001',
        '100002',
        '100003',
        '100004',
        '100005',
        '100006',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.triple).toEqual({ sales: 100004, production: 100005, exports: 100006 });
    });

    it('no lee el renglón 16 después de la etiqueta', () => {
      const lines = [
        'Octubre',
        ...Array<string>(10).fill(''),
        '100001',
        '100002',
        '100003',
        '100004',
        '100005',
        '100006',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.tokens).toEqual([100001, 100002, 100003, 100004, 100005]);
      expect(scan.triple).toEqual({ sales: 0, production: 0, exports: 0 });
    });

    it('ignora la etiqueta en los últimos renglones del documento', () => {
      const lines = ['Índice', 'Octubre', '111111', '222222', '333333', '444444', '555555', '666666'];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.labelLine).toBeNull();
      expect(scan.warnings).toEqual(['Tabla mensual: no se encontró la etiqueta "Octubre"']);
    });

    it('tras un bloque incompleto sigue buscando la etiqueta más abajo', () => {
      const lines = [
        'Octubre',
        'Cifras preliminares 2025',
        'Enero-Octubre',
        'Octubre',
        '123251',
        '358602',
        '298774',
        '128930',
        '352114',
        '301567',
        ...FOOTER,
      ];

      const scan = scanMonthlyBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.labelLine).toBe(3);
      expect(scan.triple).toEqual({ sales: 128930, production: 352114, exports: 301567 });
      expect(scan.warnings).toHaveLength(1);
    });

    it('la etiqueta debe ser exactamente el mes', () => {
      const lines = ['Octubre 2025', '123251', '358602', '298774', '128930', '352114', '301567', ...FOOTER];

      expect(scanMonthlyBlock(lines, 'Octubre', CONFIG).labelLine).toBeNull();
    });
  });

  describe('scanYearToDateBlock', () => {
    it('usa el piso de 10 000 y se detiene en la nota al pie', () => {
      const lines = [
        'ENERO-OCTUBRE 2025',
        '5 000',
        '1 150 320',
        '3 402 118',
        '2 879 401',
        '1 201 044',
        '3 301 122',
        '2 905 300',
        '1/ Cifras preliminares.',
        '9 999 999',
        ...FOOTER,
      ];

      const scan = scanYearToDateBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.tokens).toEqual([1150320, 3402118, 2879401, 1201044, 3301122, 2905300]);
      expect(scan.triple).toEqual({ sales: 1201044, production: 3301122, exports: 2905300 });
    });

    it('se detiene en la cita de la fuente', () => {
      const lines = ['Enero-Octubre', '1 150 320', '3 402 118', 'Fuente: INEGI', '2 879 401', ...FOOTER];

      const scan = scanYearToDateBlock(lines, 'Octubre', CONFIG);

      expect(scan.tokens).toEqual([1150320, 3402118]);
      expect(scan.warnings).toEqual([
        'Tabla acumulado: la etiqueta "enero-octubre" (renglón 1) tiene 2 cifras, se esperaban 6',
      ]);
    });
    it('lee las cifras del renglón de la fuente antes de cerrar', () => {
      const lines = [
        'Enero-Octubre',
        '1 150 320',
        '3 402 118',
        '2 879 401',
        '1 201 044',
        '3 301 122',
        '2 905 300 Fuente: INEGI',
        '4 000 000',
        ...FOOTER,
      ];

      const scan = scanYearToDateBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.tokens).toEqual([1150320, 3402118, 2879401, 1201044, 3301122, 2905300]);
      expect(scan.triple).toEqual({ sales: 1201044, production: 3301122, exports: 2905300 });
    });

    it('ignora la etiqueta acumulada en los últimos renglones del documento', () => {
      const lines = [
        'Índice',
        'Enero-Octubre',
        '1 150 320',
        '3 402 118',
        '2 879 401',
        '1 201 044',
        '3 301 122',
        '2 905 300',
      ];

      const scan = scanYearToDateBlock(lines, 'Octubre', CONFIG);

      expect(scan.labelLine).toBeNull();
      expect(scan.triple).toEqual({ sales: 0, production: 0, exports: 0 });
      expect(scan.warnings).toEqual(['Tabla acumulado: no se encontró la etiqueta "enero-octubre"']);
    });

    it('tras un bloque acumulado incompleto sigue buscando la etiqueta más abajo', () => {
      const lines = [
        'Enero-Octubre',
        '5 000',
        'Fuente: INEGI',
        'Cuadro 2',
        'Enero-octubre 2025',
        '1 150 320',
        '3 402 118',
        '2 879 401',
        '1 201 044',
        '3 301 122',
        '2 905 300',
        '1/ Cifras preliminares.',
        ...FOOTER,
      ];

      const scan = scanYearToDateBlock(lines, 'Octubre', CONFIG);

      expect(scan.state).toBe('done');
      expect(scan.labelLine).toBe(4);
      expect(scan.triple).toEqual({ sales: 1201044, production: 3301122, exports: 2905300 });
      expect(scan.warnings).toEqual([
        'Tabla acumulado: la etiqueta "enero-octubre" (renglón 1) tiene 0 cifras, se esperaban 6',
      ]);
    });
  });

  describe('scanNumericBlock', () => {
    it('respeta la ventana y el umbral que recibe', () => {
      const lines = ['TOTAL', '50', '60', '70', '80', '90', '95', '99', 'x', 'y', 'z', 'w'];

      const scan = scanNumericBlock(
        lines,
        {
          name: 'prueba',
          label: 'TOTAL',
          isLabel: (line) => line === 'TOTAL',
          isTerminator: () => false,
          minMagnitude: 55,
        },
        { window: 6, trailingGuard: 0 },
      );

      expect(scan.tokens).toEqual([60, 70, 80, 90, 95]);
      expect(scan.state).toBe('seeking-label');
    });
  });
});
