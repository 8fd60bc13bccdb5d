/**
 * Barrel exports for the section-filler module.
 */

export { fillSection, collectNeededSettings } from './section-filler.js'
