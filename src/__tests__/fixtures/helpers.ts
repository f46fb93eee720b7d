import type { EntityExtractor } from '../../extract/base-extractor.js';
import type { ExtractionOutput } from '../../graph/types.js';
import { parseSnapshot, type SnapshotDocument } from '../../host/snapshot-document.js';
import type { HostComponent, HostDocument, HostEntity } from '../../host/types.js';
import type { MemoryGraphStore } from '../../store/memory-store.js';
import type {
  GraphReadUnit,
  GraphStore,
  GraphWriteUnit,
  SchemaStatement,
  TransactionOptions,
} from '../../store/types.js';
import { buildCubeSnapshot, type FixtureSnapshot } from './cube-snapshot.js';

export function cubeDocument(): SnapshotDocument {
  return parseSnapshot(buildCubeSnapshot());
}

export function documentOf(snapshot: FixtureSnapshot): SnapshotDocument {
  return parseSnapshot(snapshot);
}

export function requireEntity(document: SnapshotDocument, token: string): HostEntity {
  const entity = document.resolve(token);
  if (!entity) throw new Error(`No entity "${token}" in fixture`);
  return entity;
}

export function extractWith<E extends HostEntity>(extractor: EntityExtractor<E>, entity: HostEntity): ExtractionOutput {
  if (!extractor.accepts(entity)) {
    throw new Error(`${extractor.name} rejected ${entity.objectType}`);
  }
  return extractor.extract(entity);
}

/**
 * GraphStore over a MemoryGraphStore that fails chosen write transactions
 * after their work has run, so the rollback path is exercised.
 */
export class FlakyStore implements GraphStore {
  writeCalls = 0;

  constructor(
    readonly inner: MemoryGraphStore,
    private readonly failWrite: (call: number) => Error | undefined
  ) {}

  verifyConnectivity(): Promise<void> {
    return this.inner.verifyConnectivity();
  }

  executeWrite<T>(work: (unit: GraphWriteUnit) => Promise<T>, options?: TransactionOptions): Promise<T> {
    this.writeCalls++;
    const failure = this.failWrite(this.writeCalls);
    return this.inner.executeWrite(async unit => {
      const result = await work(unit);
      if (failure) throw failure;
      return result;
    }, options);
  }

  executeRead<T>(work: (unit: GraphReadUnit) => Promise<T>, options?: TransactionOptions): Promise<T> {
    return this.inner.executeRead(work, options);
  }

  runSchema(statements: readonly SchemaStatement[]): Promise<void> {
    return this.inner.runSchema(statements);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

/**
 * Document that closes itself after `openChecks` reads of `isOpen`.
 */
export class ClosingDocument implements HostDocument {
  private checks = 0;

  constructor(
    private readonly inner: SnapshotDocument,
    private readonly openChecks: number
  ) {}

  get name(): string {
    return this.inner.name;
  }

  get isOpen(): boolean {
    this.checks++;
    if (this.checks > this.openChecks) this.inner.close();
    return this.inner.isOpen;
  }

  get rootComponent(): HostComponent {
    return this.inner.rootComponent;
  }
}
