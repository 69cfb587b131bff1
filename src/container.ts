export const KEYS = {
  // External data
  SPORTS_DATA_PROVIDER: 'sportsDataProvider',

  // Services
  PROJECTION_SERVICE: 'projectionService',
} as const;

export type ContainerKey = (typeof KEYS)[keyof typeof KEYS];

type Factory<T> = () => T;

/**
 * Minimal lazy-singleton registry. Factories run on first resolve.
 */
class Container {
  private factories = new Map<ContainerKey, Factory<unknown>>();
  private instances = new Map<ContainerKey, unknown>();

  register<T>(key: ContainerKey, factory: Factory<T>): void {
    this.factories.set(key, factory);
    this.instances.delete(key);
  }

  resolve<T>(key: ContainerKey): T {
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }

    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as T;
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: drop cached singletons
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: swap in a fake
  override<T>(key: ContainerKey, instance: T): void {
    this.instances.set(key, instance);
  }
}

export const container = new Container();
