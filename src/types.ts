/**
 * Type definitions for the OCI image store
 * Database row interfaces and the shapes the operations accept and return
 */

// ============================================================================
// Database Rows (as stored)
// ============================================================================

/**
 * Row in `images`
 */
export interface ImageRow {
  id: number;
  reference: string;
  size_bytes: number;
  last_used_at: string | null;
  created_at: string;
  modified_at: string;
}

/**
 * Row in `manifests`
 */
export interface ManifestRow {
  id: number;
  image_id: number;
  schema_version: number;
  media_type: string;
  annotations_json: string | null;
  created_at: string;
  modified_at: string;
}

/**
 * Row in `layers`
 */
export interface LayerRow {
  id: number;
  digest: string;
  diff_id: string | null;
  media_type: string;
  size_bytes: number;
  created_at: string;
  modified_at: string;
}

// ============================================================================
// Operation Inputs / Outputs
// ============================================================================

export type Annotations = Record<string, string>;

export interface NewImage {
  /** Any registry; normalised before storage */
  reference: string;
  sizeBytes: number;
}

export interface Image {
  id: number;
  reference: string;
  sizeBytes: number;
  lastUsedAt: string | null;
}

export interface NewManifest {
  imageId: number;
  schemaVersion: number;
  mediaType: string;
  annotations?: Annotations;
}

export interface Manifest {
  id: number;
  imageId: number;
  schemaVersion: number;
  mediaType: string;
  annotations: Annotations | null;
  createdAt: string;
  modifiedAt: string;
}
