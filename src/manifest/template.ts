import { ManifestRecord } from "../types/manifestRecord";
import { nexusIdFromUrl } from "./updateUrl";

export interface SyntheticManifest {
  Name: string;
  Author: string;
  Version: string;
  Description: string;
  UniqueID: string;
  MinimumGameVersion: string;
  MinimumApiVersion: string;
  UpdateKeys: string[];
  ContentPackFor?: { UniqueID: string };
  Dependencies: never[];
  Maps: Record<string, never>;
}

const CONTENT_PATCHER_ID = "Pathoschild.ContentPatcher";

export function buildSyntheticManifest(record: ManifestRecord): SyntheticManifest {
  const name = record.name ?? "Unknown Mod";
  const nexusId = record.updateUrl ? nexusIdFromUrl(record.updateUrl) : null;

  const manifest: SyntheticManifest = {
    Name: name,
    Author: "Test Author",
    Version: "1.0.0",
    Description: record.description ?? "No description provided",
    UniqueID: record.uniqueId || "unknown.mod",
    MinimumGameVersion: "1.5.6",
    MinimumApiVersion: "3.14.0",
    UpdateKeys: nexusId ? [`Nexus:${nexusId}`] : [],
    Dependencies: [],
    Maps: {}
  };

  // [CP] is the community prefix for Content Patcher packs.
  if (name.includes("[CP]")) {
    manifest.ContentPackFor = { UniqueID: CONTENT_PATCHER_ID };
  }
  return manifest;
}
