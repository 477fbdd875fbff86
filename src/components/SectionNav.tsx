import { For, createMemo } from "solid-js";
import { t } from "~/lib/i18n";
import { buildNavigationTree } from "~/lib/navigation";
import type { Section, SectionId } from "~/lib/types";

export interface SectionNavProps {
	/** Sections in display order */
	sections: readonly Section[];
	/** Id of the section shown on the current page */
	activeSectionId?: SectionId | null;
	/** Accessible name of the nav landmark */
	label?: string;
}

export function SectionNav(props: SectionNavProps) {
	const items = createMemo(() => buildNavigationTree(props.sections, props.activeSectionId));

	return (
		<nav class="ui-nav" aria-label={props.label ?? t("nav.label")}>
			<ul class="ui-nav-list">
				<For each={items()}>
					{(item) => (
						<li>
							<a
								href={item.section.url}
								class="ui-nav-link"
								classList={{ "ui-nav-link-active": item.active }}
								aria-current={item.active ? "page" : undefined}
							>
								{item.section.title}
							</a>
						</li>
					)}
				</For>
			</ul>
		</nav>
	);
}
