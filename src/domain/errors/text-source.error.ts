/**
 * El adaptador de texto no pudo convertir el documento (PDF corrupto, vacío, etc.).
 */
export class TextSourceError extends Error {
  constructor(
    readonly fileName: string,
    reason: string,
  ) {
    super(`No se pudo leer el texto de "${fileName}": ${reason}`);
    this.name = 'TextSourceError';
  }
}
