/**
 * SectionFiller — offers the interaction channel the chance to supply
 * settings that discovered bears require but no layer provided.
 *
 * Completeness is not enforced: with a NullInteractor the gaps stay, and a
 * bear fails later if it actually needs the value.
 */

import type { BearDescriptor } from '../bears/types.js'
import type { Interactor, NeededSetting } from '../output/interactor.js'
import type { Section } from '../settings/section.js'
import { INTERACTIVE_ORIGIN } from '../settings/setting.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('section-filler')

/**
 * Settings required by `bears` that `section` cannot answer, itself or
 * through its defaults. Ordered by bear, then by declaration within a bear.
 */
export function collectNeededSettings(
  section: Section,
  bears: readonly BearDescriptor[]
): NeededSetting[] {
  const needed = new Map<string, { help: string; bears: string[] }>()

  for (const bear of bears) {
    for (const spec of bear.requiredSettings) {
      const entry = needed.get(spec.name)
      if (entry !== undefined) {
        if (!entry.bears.includes(bear.name)) entry.bears.push(bear.name)
      } else {
        needed.set(spec.name, { help: spec.help, bears: [bear.name] })
      }
    }
  }

  return Array.from(needed.entries())
    .filter(([name]) => !section.has(name))
    .map(([name, entry]) => ({ name, help: entry.help, bears: entry.bears }))
}

/**
 * Ask `interactor` for every missing required setting and store the answers
 * in `section` as explicit settings.
 */
export async function fillSection(
  section: Section,
  bears: readonly BearDescriptor[],
  interactor: Interactor
): Promise<Section> {
  const needed = collectNeededSettings(section, bears)
  if (needed.length === 0) return section

  const answers = await interactor.acquireSettings(needed)
  for (const setting of needed) {
    const value = answers.get(setting.name)
    if (value !== undefined) {
      section.set(setting.name, value, INTERACTIVE_ORIGIN)
    }
  }

  logger.debug(
    { section: section.name, needed: needed.length, answered: answers.size },
    'Section filled'
  )
  return section
}
