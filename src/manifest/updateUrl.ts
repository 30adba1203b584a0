const UPDATE_KEYS = /"UpdateKeys"\s*:\s*\[([\s\S]*?)\]/;
const NEXUS_KEY = /"Nexus:(\d+)"/;
const NEXUS_URL = /^https:\/\/www\.nexusmods\.com\/stardewvalley\/mods\/(\d+)$/;

export function nexusModUrl(modId: string): string {
  return `https://www.nexusmods.com/stardewvalley/mods/${modId}`;
}

/** Nexus mod id from the first `UpdateKeys` array, or null when there is none. */
export function findNexusId(text: string): string | null {
  const keys = UPDATE_KEYS.exec(text);
  if (!keys) return null;
  const nexus = NEXUS_KEY.exec(keys[1]);
  return nexus ? nexus[1] : null;
}

export function findUpdateUrl(text: string): string | null {
  const modId = findNexusId(text);
  return modId ? nexusModUrl(modId) : null;
}

export function nexusIdFromUrl(url: string): string | null {
  const match = NEXUS_URL.exec(url);
  return match ? match[1] : null;
}
