/**
 * Pets
 */

import type { Adapter } from './adapter'
import type { Pet, Walk } from './domain-types'
import type { PetId } from './types'
import { getActiveWalkTasks } from './conflicts'

/** Walks attached to the pet's open tasks, whatever their status, in insertion order */
export function getScheduledWalks(adapter: Adapter, petId: PetId): Walk[] {
  return getActiveWalkTasks(adapter, petId).map((entry) => entry.walk)
}

export function getPetDetails(pet: Pet): string {
  const years = pet.age === 1 ? 'year' : 'years'
  return `${pet.name} (${pet.breed}, ${pet.age} ${years} old)`
}
