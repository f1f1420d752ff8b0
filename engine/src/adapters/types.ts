/**
 * phpforge Engine — Host Adapter Interfaces
 *
 * Each external system tool the engine depends on is modelled as a narrow
 * interface with one concrete adapter. Steps only talk to these interfaces,
 * which keeps the Debian-specific command lines in one place.
 */

export interface PackageManager {
  /** Subset of `packages` that is not fully installed */
  missingPackages(packages: string[]): Promise<string[]>;
  update(): Promise<void>;
  install(packages: string[]): Promise<void>;
  addRepository(id: string): Promise<void>;
}

export interface ServiceManager {
  isActive(service: string): Promise<boolean>;
  /** Returns false when the restart failed */
  restart(service: string): Promise<boolean>;
}

export interface AlternativeEntry {
  path: string;
  priority: number;
}

export interface AlternativesManager {
  query(name: string): Promise<AlternativeEntry[]>;
  /** Returns false when nothing was removed or the call failed */
  removeAll(name: string): Promise<boolean>;
  install(
    link: string,
    name: string,
    target: string,
    priority: number,
  ): Promise<void>;
}
