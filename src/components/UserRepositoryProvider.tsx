import { useState, type ReactNode } from 'react'
import { InMemoryUserRepository, type UserRepository } from '@/lib/userRepository'
import { UserRepositoryContext } from '@/hooks/useUserRepository'

interface UserRepositoryProviderProps {
  children: ReactNode
  /** Defaults to the in-memory table */
  repository?: UserRepository
}

export function UserRepositoryProvider({ children, repository }: UserRepositoryProviderProps) {
  const [fallback] = useState<UserRepository>(() => new InMemoryUserRepository())
  return (
    <UserRepositoryContext.Provider value={repository ?? fallback}>
      {children}
    </UserRepositoryContext.Provider>
  )
}
