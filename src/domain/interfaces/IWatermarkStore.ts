/**
 * Watermark Store Interface
 * Layer: Domain
 *
 * The watermark is the `stop` of the last window whose load fully succeeded.
 * Planning reads it to pick the next start; the Run Controller writes it
 * after each successful window, never in test mode.
 */
export interface IWatermarkStore {
  read(): Promise<Date | null>;
  write(stop: Date): Promise<void>;
}
