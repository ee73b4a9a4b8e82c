import { DateTime } from 'luxon'

/** Source of "now"; injected so tests can pin the date */
export type Clock = () => DateTime

export const systemClock: Clock = () => DateTime.now()
