import { RegistryError } from '../core/errors';
import type { DockPanelInit, PanelContent } from '../dock/DockPanel';

export type PanelContentClass = new () => PanelContent;
export type PanelContentFactory = () => PanelContent;

export interface WidgetDefinition {
  key: string;
  defaultTitle: string;
  create: PanelContentFactory;
}

/**
 * Content types and factories by string key. Used to rebuild panels when a
 * layout is loaded and for application-driven "create by key".
 */
export class WidgetRegistry {
  private definitions = new Map<string, WidgetDefinition>();

  register(key: string, contentClass: PanelContentClass, defaultTitle: string = key): void {
    this.add({ key, defaultTitle, create: () => new contentClass() });
  }

  registerFactory(key: string, factory: PanelContentFactory, defaultTitle: string = key): void {
    this.add({ key, defaultTitle, create: factory });
  }

  has(key: string): boolean {
    return this.definitions.has(key);
  }

  get(key: string): WidgetDefinition | undefined {
    return this.definitions.get(key);
  }

  keys(): string[] {
    return Array.from(this.definitions.keys());
  }

  create(key: string): Required<Pick<DockPanelInit, 'title' | 'content'>> {
    const definition = this.definitions.get(key);
    if (!definition) {
      throw new RegistryError(`No widget registered under "${key}"`);
    }
    return { title: definition.defaultTitle, content: definition.create() };
  }

  unregister(key: string): boolean {
    return this.definitions.delete(key);
  }

  private add(definition: WidgetDefinition): void {
    if (this.definitions.has(definition.key)) {
      throw new RegistryError(`Widget key "${definition.key}" is already registered`);
    }
    this.definitions.set(definition.key, definition);
  }
}
