/**
 * phpforge Catalog — Installable Units
 *
 * Flattens a manifest into the units it installs, in provisioning order.
 */

import { InstallableUnit, ProvisionManifest } from '@phpforge/engine';

export function installableUnits(manifest: ProvisionManifest): InstallableUnit[] {
  const units = manifest.system_packages.map((name): InstallableUnit => ({
    name,
    kind: 'package',
  }));

  units.push({ name: manifest.composer.command, kind: 'cli_tool' });

  for (const version of manifest.php.versions) {
    units.push({ name: `php${version}`, version, kind: 'runtime' });
    for (const ext of manifest.php.extensions) {
      units.push({ name: `php${version}-${ext}`, version, kind: 'extension' });
    }
  }

  for (const cli of manifest.frameworks) {
    units.push({ name: cli.command, kind: 'cli_tool' });
  }

  return units;
}
