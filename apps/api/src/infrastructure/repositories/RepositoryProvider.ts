export type RConstructor<T> = abstract new (...args: never[]) => T;

export abstract class RepositoryProvider {
    abstract get<T>(repositoryType: RConstructor<T>): T;
}

export class DrizzleRepositoryProvider extends RepositoryProvider {
    private cache = new Map<RConstructor<unknown>, unknown>();
    private factories = new Map<RConstructor<unknown>, () => unknown>();

    register<T>(
        abstraction: RConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(abstraction, factory);
    }

    get<T>(repositoryType: RConstructor<T>): T {
        if (!this.cache.has(repositoryType)) {
            const factory = this.factories.get(repositoryType);

            if (!factory) {
                throw new Error(
                    `${repositoryType.name} not registered`
                );
            }

            this.cache.set(repositoryType, factory());
        }

        const repository = this.cache.get(repositoryType);
        if (!(repository instanceof repositoryType)) {
            throw new Error(`Registered ${repositoryType.name} does not extend it`);
        }
        return repository;
    }
}
