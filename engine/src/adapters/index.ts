export type {
  PackageManager,
  ServiceManager,
  AlternativesManager,
  AlternativeEntry,
} from "./types";
export { AptPackageManager, parseInstalledPackages } from "./apt";
export { SystemctlServiceManager } from "./systemctl";
export { UpdateAlternativesManager, parseAlternativesQuery } from "./alternatives";
