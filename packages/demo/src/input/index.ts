import { createAutopilotInput } from './autopilot'
import { createScriptedInput } from './scripted'
import { inputKindKeywords } from './types'
import type { InputConfig, InputSource } from './types'

export * from './types'
export * from './autopilot'
export * from './scripted'

export function createInputSource(config: InputConfig): InputSource {
  switch (config.kind) {
    case inputKindKeywords.autopilot:
      return createAutopilotInput()
    case inputKindKeywords.scripted:
      return createScriptedInput(config.flapTimesMs)
    case inputKindKeywords.idle:
      return () => false
  }
}

export const describeInput = (config: InputConfig): string =>
  config.kind === inputKindKeywords.scripted
    ? `scripted (${config.flapTimesMs.length} flaps)`
    : config.kind
