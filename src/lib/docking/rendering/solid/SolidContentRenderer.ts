import { createComponent, createSignal } from 'solid-js';
import type { Accessor, Component, Setter } from 'solid-js';
import { render } from 'solid-js/web';
import type { IContentRenderer, IRenderParams } from '../IContentRenderer';

export interface SolidPanelProps {
  panelId: string;
  title: string;
  selected: Accessor<boolean>;
}

/**
 * Mounts a Solid component as panel content. Selection is exposed as a signal
 * so the component reacts without being remounted.
 */
export class SolidContentRenderer implements IContentRenderer {
  private _dispose: (() => void) | null = null;
  private readonly selected: Accessor<boolean>;
  private readonly setSelected: Setter<boolean>;

  constructor(private readonly component: Component<SolidPanelProps>) {
    const [selected, setSelected] = createSignal(false);
    this.selected = selected;
    this.setSelected = setSelected;
  }

  init(container: HTMLElement, params: IRenderParams): void {
    this.setSelected(params.selected);
    const props: SolidPanelProps = {
      panelId: params.panel.persistentId,
      title: params.panel.title,
      selected: this.selected,
    };
    this._dispose = render(() => createComponent(this.component, props), container);
  }

  update(params: Partial<IRenderParams>): void {
    if (params.selected !== undefined) {
      this.setSelected(params.selected);
    }
  }

  dispose(): void {
    if (this._dispose) {
      this._dispose();
      this._dispose = null;
    }
  }
}
