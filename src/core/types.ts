/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered against one of these symbols in
 * container.ts. Grouped by layer so the wiring is easy to scan.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),
  Config: Symbol.for('Config'),

  // Ports: source, sink, watermark
  SourceApiClient: Symbol.for('SourceApiClient'),
  Sink: Symbol.for('Sink'),
  WatermarkStore: Symbol.for('WatermarkStore'),

  // Pipeline stages
  WindowPlanner: Symbol.for('WindowPlanner'),
  Extractor: Symbol.for('Extractor'),
  Transformer: Symbol.for('Transformer'),
  TableMappings: Symbol.for('TableMappings'),

  // Services
  SyncService: Symbol.for('SyncService'),
} as const;
