/**
 * Package Manifests
 *
 * Requirements-style dependency manifests, OS package lists and version
 * constraints.
 *
 * @module manifests
 */

export {
  VERSION_OPERATORS,
  compareVersions,
  sortVersionsDescending,
  satisfiesConstraint,
  satisfiesAll,
  formatConstraint,
  formatConstraints,
  type VersionOperator,
  type VersionConstraint,
} from './version.js';

export {
  normalizePackageName,
  parseRequirementLine,
  parseRequirements,
  readRequirementsFile,
  mergeRequirements,
  formatRequirement,
  type Requirement,
  type RequirementsManifest,
} from './requirements.js';

export {
  normalizeSystemPackages,
  formatSystemPackages,
  type NormalizedSystemPackages,
} from './system.js';
