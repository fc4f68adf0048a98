/**
 * The root aggregate of one build: an arena of packages addressed by id,
 * an import-path index over them, and the current package order.
 */
import type { BuildPlan, NewPackage, Package, PackageId, SourceFile } from './types.js';

export class Application {
  /** Application source files (workspace package files live on their packages) */
  readonly files: SourceFile[] = [];
  private readonly arena: Package[] = [];
  private readonly index = new Map<string, PackageId>();
  private readonly roots: PackageId[] = [];
  /** Package ids in build order once sorted; registration order before that */
  private order: PackageId[] = [];

  /**
   * Register a package. The import path must not be registered yet.
   */
  addPackage(spec: NewPackage): Package {
    if (this.index.has(spec.importPath)) {
      throw new Error(`package ${spec.importPath} is already registered`);
    }
    const pkg: Package = {
      id: this.arena.length,
      importPath: spec.importPath,
      files: spec.files,
      dependencies: [],
      hasInit: spec.hasInit ?? false,
      isShadow: spec.isShadow ?? false,
      ...(spec.baseDir === undefined ? {} : { baseDir: spec.baseDir }),
    };
    this.arena.push(pkg);
    this.index.set(pkg.importPath, pkg.id);
    this.order.push(pkg.id);
    if (pkg.hasInit) {
      this.roots.push(pkg.id);
    }
    return pkg;
  }

  get(id: PackageId): Package {
    const pkg = this.arena[id];
    if (!pkg) {
      throw new RangeError(`no package with id ${id}`);
    }
    return pkg;
  }

  lookup(importPath: string): Package | undefined {
    const id = this.index.get(importPath);
    return id === undefined ? undefined : this.get(id);
  }

  has(importPath: string): boolean {
    return this.index.has(importPath);
  }

  get size(): number {
    return this.arena.length;
  }

  /** Packages in the current order. */
  get packages(): Package[] {
    return this.order.map(id => this.get(id));
  }

  /** Packages with initialization logic, in registration order. */
  get rootPackages(): Package[] {
    return this.roots.map(id => this.get(id));
  }

  getOrder(): readonly PackageId[] {
    return this.order;
  }

  /**
   * Replace the package order. Must be a permutation of the current one.
   */
  setOrder(order: readonly PackageId[]): void {
    if (order.length !== this.order.length || new Set(order).size !== order.length ||
      order.some(id => this.arena[id] === undefined)) {
      throw new Error('package order must be a permutation of the registered packages');
    }
    this.order = [...order];
  }

  dependenciesOf(pkg: Package): Package[] {
    return pkg.dependencies.map(id => this.get(id));
  }

  toPlan(): BuildPlan {
    return {
      packages: this.packages.map(pkg => ({
        importPath: pkg.importPath,
        ...(pkg.baseDir === undefined ? {} : { baseDir: pkg.baseDir }),
        files: pkg.files.map(f => f.name),
        dependencies: this.dependenciesOf(pkg).map(dep => dep.importPath),
        hasInit: pkg.hasInit,
        isShadow: pkg.isShadow,
      })),
      rootPackages: this.rootPackages.map(pkg => pkg.importPath),
    };
  }
}
