import type { ForeignKeyCandidate } from '../../domain/model/ForeignKey.js';
import type { TableMetadata } from '../../domain/model/TableMetadata.js';
import { resolveForeignKeys } from '../../domain/services/ForeignKeyResolver.js';
import type { LoadContext } from '../LoadContext.js';

/** Use case: infer foreign keys between all inspected tables. */
export class ResolveSchema {
  constructor(private readonly ctx: LoadContext) {}

  execute(tables: readonly TableMetadata[]): ForeignKeyCandidate[] {
    const foreignKeys = resolveForeignKeys(tables, this.ctx.policies.resolveReferencedTable);

    this.ctx.eventBus.emit({
      type: 'schema:resolved',
      runId: this.ctx.runId,
      foreignKeys,
      timestamp: Date.now(),
    });

    return foreignKeys;
  }
}
