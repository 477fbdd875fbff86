import { useLocation } from "@solidjs/router";
import { Match, Switch, createMemo, onMount } from "solid-js";
import { resolveActiveSectionFromPath, resolveActiveSectionId } from "~/lib/active-section";
import { t } from "~/lib/i18n";
import type { SectionStore } from "~/lib/section-store";
import type { SectionId } from "~/lib/types";
import { SectionNav } from "./SectionNav";

export interface DynamicNavProps {
	store: SectionStore;
	/** Overrides route-based matching when the page knows its section */
	activeSectionId?: SectionId | null;
}

/**
 * Section navigation fed by the content backend.
 * Must be rendered inside a router.
 */
export function DynamicNav(props: DynamicNavProps) {
	const location = useLocation();
	// Read once: an inline `store={createSectionStore()}` compiles to a getter.
	const store = props.store;

	const activeId = createMemo(
		() =>
			resolveActiveSectionId({ activeSectionId: props.activeSectionId }) ??
			resolveActiveSectionFromPath(store.sections(), location.pathname),
	);

	onMount(() => {
		// The store records and logs the failure; the alert below shows it.
		store.loadSections().catch(() => undefined);
	});

	return (
		<Switch fallback={<SectionNav sections={store.sections()} activeSectionId={activeId()} />}>
			<Match when={store.loading()}>
				<p class="ui-nav-status">{t("nav.loading")}</p>
			</Match>
			<Match when={store.error()}>
				<p class="ui-nav-error" role="alert">
					{t("nav.error")}
				</p>
			</Match>
		</Switch>
	);
}
