export type ChunkMetadata = {
  documentName: string;
  documentType: string;
  chunkIndex: number;
};

/** Payload stored with every indexed chunk. */
export type ChunkPayload = ChunkMetadata & {
  text: string;
  indexedAt: string;
};

export type RetrievalHit = {
  text: string;
  metadata: ChunkMetadata;
  score: number;
};

export type DocumentChunk = {
  text: string;
  metadata: ChunkMetadata;
};

export type StoredDocument = {
  name: string;
  type: string;
  chunkCount: number;
};

/**
 * The document store. `listDocuments` returns documents in indexing order,
 * which is the order users refer to as "document 1", "document 2".
 */
export type RetrievalBackend = {
  search(query: string, topK: number, signal?: AbortSignal): Promise<RetrievalHit[]>;
  listDocuments(signal?: AbortSignal): Promise<StoredDocument[]>;
  getDocumentChunks(name: string, signal?: AbortSignal): Promise<DocumentChunk[]>;
  deleteDocument(name: string, signal?: AbortSignal): Promise<boolean>;
  addChunks(
    document: { name: string; type: string },
    chunks: string[],
    signal?: AbortSignal,
  ): Promise<number>;
};
