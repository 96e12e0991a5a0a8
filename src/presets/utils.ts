export function getNextPresetId(presets: { id: string }[], currentId: string) {
  const idx = presets.findIndex((p) => p.id === currentId);
  if (idx === -1) return presets[0]?.id ?? "";
  return presets[(idx + 1) % presets.length].id;
}
