export * from "./components";
export { buildNavigationTree } from "./lib/navigation";
export {
	normalizePath,
	resolveActiveSectionFromPath,
	resolveActiveSectionId,
} from "./lib/active-section";
export { sectionApi, toSection, toSections, type SectionSource } from "./lib/section-api";
export { createSectionStore, type SectionStore } from "./lib/section-store";
export { SectionSourceError } from "./lib/errors";
export { locale, setLocale, t, type Locale } from "./lib/i18n";
export type { NavigationItem, PageContext, Section, SectionId } from "./lib/types";
