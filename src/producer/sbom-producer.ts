import type { Release } from "../core/release.js";

export type SbomDocument = {
  releaseId: string;
  fileName: string;
  content: Buffer;
};

/** Black-box SBOM generation for one release. Rejects with ProducerError. */
export interface SbomProducer {
  produce(release: Pick<Release, "id" | "kind">): Promise<SbomDocument>;
}
