/**
 * Sandbox Module
 *
 * Containment of untrusted paths under a trusted root.
 */

export {
  isWithin,
  canonicalize,
  resolveInSandbox,
  createPathSandbox,
  type PathSandbox,
} from './path-sandbox.js';
