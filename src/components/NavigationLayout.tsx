import type { JSX } from "solid-js";

export interface NavigationLayoutProps {
	nav: JSX.Element;
	children?: JSX.Element;
}

export function NavigationLayout(props: NavigationLayoutProps) {
	return (
		<div class="ui-layout">
			{props.nav}
			<main class="ui-layout-main">{props.children}</main>
		</div>
	);
}
