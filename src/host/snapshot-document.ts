/**
 * Snapshot Document
 *
 * A HostDocument read from a JSON export of a CAD design, so the pipeline
 * can run outside the CAD application.
 *
 * Format (version 1):
 * ```json
 * {
 *   "version": 1,
 *   "name": "Bracket",
 *   "rootComponent": "comp-root",
 *   "entities": [
 *     {
 *       "token": "sk-1",
 *       "objectType": "Sketch",
 *       "name": "Sketch1",
 *       "properties": { "timelineIndex": 0 },
 *       "refs": { "parentComponent": "comp-root", "points": ["pt-1", "pt-2"] }
 *     }
 *   ]
 * }
 * ```
 *
 * `kind` may be given per entity; otherwise it is derived from objectType.
 * `"transient": true` marks an entity the host exposes no token for.
 */

import { promises as fs } from 'fs';
import { HostUnavailableError, SnapshotFormatError, errorMessage } from '../errors.js';
import {
  isComponent,
  kindForObjectType,
  type EntityKind,
  type HostComponent,
  type HostDocument,
  type HostEntity,
} from './types.js';
import {
  createSnapshotHandle,
  isJsonObject,
  type SnapshotEntityRecord,
  type SnapshotJsonValue,
  type SnapshotResolver,
} from './snapshot-handles.js';

export const SNAPSHOT_VERSION = 1;

const ENTITY_KINDS: ReadonlySet<string> = new Set<EntityKind>([
  'component',
  'sketch',
  'sketchPoint',
  'sketchLine',
  'sketchArc',
  'sketchCircle',
  'sketchCurve',
  'sketchDimension',
  'sketchConstraint',
  'profile',
  'feature',
  'parameter',
  'constructionGeometry',
  'brepBody',
  'brepLump',
  'brepShell',
  'brepFace',
  'brepEdge',
  'brepVertex',
  'unknown',
]);

function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.has(value);
}

export class SnapshotDocument implements HostDocument, SnapshotResolver {
  readonly name: string;
  private open = true;
  private readonly records: Map<string, SnapshotEntityRecord>;
  private readonly handles = new Map<string, HostEntity>();

  constructor(
    name: string,
    private readonly rootToken: string,
    records: readonly SnapshotEntityRecord[]
  ) {
    this.name = name;
    this.records = new Map(records.map(record => [record.token, record]));
  }

  get isOpen(): boolean {
    return this.open;
  }

  get rootComponent(): HostComponent {
    this.assertOpen();
    const root = this.resolve(this.rootToken);
    if (!root || !isComponent(root)) {
      throw new SnapshotFormatError(`rootComponent "${this.rootToken}" is not a component`);
    }
    return root;
  }

  get entityCount(): number {
    return this.records.size;
  }

  /**
   * After close, every entity accessor throws HostUnavailableError.
   */
  close(): void {
    this.open = false;
  }

  assertOpen(): void {
    if (!this.open) {
      throw new HostUnavailableError(`Document "${this.name}" is closed`);
    }
  }

  /** Handle for a token; the same object is returned on every call */
  resolve(token: string): HostEntity | undefined {
    const cached = this.handles.get(token);
    if (cached) return cached;

    const record = this.records.get(token);
    if (!record) return undefined;

    const handle = createSnapshotHandle(this, record);
    this.handles.set(token, handle);
    return handle;
  }
}

// ============================================
// Parsing
// ============================================

/**
 * Validate a parsed JSON value and build a document from it.
 *
 * @throws SnapshotFormatError describing the first invalid field
 */
export function parseSnapshot(input: unknown): SnapshotDocument {
  if (!isJsonObject(input)) {
    throw new SnapshotFormatError('Snapshot must be a JSON object');
  }
  if (input.version !== SNAPSHOT_VERSION) {
    throw new SnapshotFormatError(
      `Unsupported snapshot version ${JSON.stringify(input.version)} (expected ${SNAPSHOT_VERSION})`
    );
  }

  const name = input.name;
  if (typeof name !== 'string' || name === '') {
    throw new SnapshotFormatError('"name" must be a non-empty string');
  }
  const rootToken = input.rootComponent;
  if (typeof rootToken !== 'string' || rootToken === '') {
    throw new SnapshotFormatError('"rootComponent" must be a non-empty string token');
  }
  const entities = input.entities;
  if (!Array.isArray(entities)) {
    throw new SnapshotFormatError('"entities" must be an array');
  }

  const records = entities.map((entity, index) => parseEntity(entity, index));

  const tokens = new Set<string>();
  for (const record of records) {
    if (tokens.has(record.token)) {
      throw new SnapshotFormatError(`Duplicate entity token "${record.token}"`);
    }
    tokens.add(record.token);
  }

  for (const record of records) {
    for (const [key, ref] of Object.entries(record.refs)) {
      for (const token of Array.isArray(ref) ? ref : [ref]) {
        if (!tokens.has(token)) {
          throw new SnapshotFormatError(
            `Entity "${record.token}" refs.${key} points to unknown token "${token}"`
          );
        }
      }
    }
  }

  const root = records.find(record => record.token === rootToken);
  if (!root) {
    throw new SnapshotFormatError(`rootComponent "${rootToken}" is not among the entities`);
  }
  if (root.kind !== 'component') {
    throw new SnapshotFormatError(`rootComponent "${rootToken}" is a ${root.objectType}, not a component`);
  }

  return new SnapshotDocument(name, rootToken, records);
}

/**
 * Read and parse a snapshot file.
 */
export async function loadSnapshotDocument(filePath: string): Promise<SnapshotDocument> {
  const content = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new SnapshotFormatError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseSnapshot(parsed);
}

function parseEntity(value: SnapshotJsonValue, index: number): SnapshotEntityRecord {
  const where = `entities[${index}]`;
  if (!isJsonObject(value)) {
    throw new SnapshotFormatError(`${where} must be an object`);
  }

  const fields: Partial<Record<string, SnapshotJsonValue>> = value;
  const { token, objectType, kind, transient, name, properties, refs } = fields;
  if (typeof token !== 'string' || token === '') {
    throw new SnapshotFormatError(`${where}.token must be a non-empty string`);
  }
  if (typeof objectType !== 'string' || objectType === '') {
    throw new SnapshotFormatError(`${where}.objectType must be a non-empty string`);
  }
  if (kind !== undefined && (typeof kind !== 'string' || !isEntityKind(kind))) {
    throw new SnapshotFormatError(`${where}.kind ${JSON.stringify(kind)} is not a known entity kind`);
  }
  if (transient !== undefined && typeof transient !== 'boolean') {
    throw new SnapshotFormatError(`${where}.transient must be a boolean`);
  }
  if (name !== undefined && typeof name !== 'string') {
    throw new SnapshotFormatError(`${where}.name must be a string`);
  }
  if (properties !== undefined && !isJsonObject(properties)) {
    throw new SnapshotFormatError(`${where}.properties must be an object`);
  }

  return {
    token,
    objectType,
    kind: kind ?? kindForObjectType(objectType),
    transient: transient ?? false,
    name,
    properties: properties ?? {},
    refs: parseRefs(refs, where),
  };
}

function parseRefs(value: SnapshotJsonValue | undefined, where: string): Record<string, string | string[]> {
  const refs: Record<string, string | string[]> = {};
  if (value === undefined) return refs;
  if (!isJsonObject(value)) {
    throw new SnapshotFormatError(`${where}.refs must be an object`);
  }

  for (const [key, ref] of Object.entries(value)) {
    if (typeof ref === 'string') {
      refs[key] = ref;
    } else if (Array.isArray(ref) && ref.every((token): token is string => typeof token === 'string')) {
      refs[key] = ref;
    } else {
      throw new SnapshotFormatError(`${where}.refs.${key} must be a token or an array of tokens`);
    }
  }
  return refs;
}
