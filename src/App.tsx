import { useState, type ComponentType, type ReactNode } from 'react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { BrowserRouter, Routes, Route, Navigate } from 'react-router-dom'
import { AppLayout } from '@/components/AppLayout'
import { ColorPickerScreen } from '@/components/ColorPickerScreen'
import { HomeScreen } from '@/components/HomeScreen'
import { NavigationEntryProvider } from '@/components/NavigationEntryProvider'
import { UserDetailScreen } from '@/components/UserDetailScreen'
import { UserListScreen } from '@/components/UserListScreen'
import { UserRepositoryProvider } from '@/components/UserRepositoryProvider'
import type { BackStack } from '@/lib/backStack'
import type { UserRepository } from '@/lib/userRepository'
import { routes } from '@/lib/routeConfig'
import './App.css'

interface AppProps {
  /** Router to mount under; tests pass a MemoryRouter */
  Router?: ComponentType<{ children?: ReactNode }>
  repository?: UserRepository
  backStack?: BackStack
  queryClient?: QueryClient
}

function AppRoutes() {
  return (
    <Routes>
      <Route element={<AppLayout />}>
        <Route index element={<Navigate to={routes.home} replace />} />
        <Route path={routes.home} element={<HomeScreen />} />
        <Route path={routes.colorPicker} element={<ColorPickerScreen />} />
        <Route path={routes.userList} element={<UserListScreen />} />
        <Route path={routes.userDetail} element={<UserDetailScreen />} />
        <Route path="*" element={<div className="error">Screen not found</div>} />
      </Route>
    </Routes>
  )
}

function App({ Router = BrowserRouter, repository, backStack, queryClient }: AppProps) {
  const [defaultClient] = useState(() => new QueryClient())

  return (
    <QueryClientProvider client={queryClient ?? defaultClient}>
      <UserRepositoryProvider repository={repository}>
        <Router>
          <NavigationEntryProvider stack={backStack}>
            <AppRoutes />
          </NavigationEntryProvider>
        </Router>
      </UserRepositoryProvider>
    </QueryClientProvider>
  )
}

export default App
