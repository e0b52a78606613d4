import { createContext, useContext } from 'react'
import type { UserRepository } from '@/lib/userRepository'

export const UserRepositoryContext = createContext<UserRepository | undefined>(undefined)

export function useUserRepository(): UserRepository {
  const repository = useContext(UserRepositoryContext)
  if (repository === undefined) {
    throw new Error('useUserRepository must be used within a UserRepositoryProvider')
  }
  return repository
}
