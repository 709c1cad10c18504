export type Language = "dynamic" | "systems" | "target";

export function languageDisplayName(language: Language): string {
  switch (language) {
    case "dynamic":
      return "Dynamic";
    case "systems":
      return "Systems";
    case "target":
      return "Target";
  }
}
