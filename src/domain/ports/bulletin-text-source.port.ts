/**
 * Token de inyección para el adaptador de texto.
 */
export const BULLETIN_TEXT_SOURCE_PORT = 'BULLETIN_TEXT_SOURCE_PORT';

/**
 * Documento binario tal como llega del llamador.
 */
export interface BulletinDocument {
  /** Nombre original del archivo (se usa para el fallback de periodo) */
  fileName: string;

  /** Contenido binario del boletín */
  data: Buffer;
}

/**
 * Puerto (interfaz) que convierte un boletín en texto plano.
 * Parte del dominio: no conoce frameworks ni infraestructura.
 */
export interface BulletinTextSourcePort {
  /**
   * Devuelve el texto completo del documento: páginas en orden,
   * una línea de texto por renglón, separadas por "\n".
   * @throws TextSourceError si el documento no se puede leer
   */
  readText(document: BulletinDocument): Promise<string>;
}
