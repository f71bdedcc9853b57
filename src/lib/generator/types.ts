/**
 * Generator module types
 */

export interface SynthesizerOptions {
  /** Ceiling on `request.count` */
  maxRecords: number;
  /** Referent batch size assumed for foreign keys with no referents */
  assumedReferentCount: number;
}
