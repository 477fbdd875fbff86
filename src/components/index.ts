// Component exports
export { SectionNav } from "./SectionNav";
export { DynamicNav } from "./DynamicNav";
export { NavigationLayout } from "./NavigationLayout";
