/**
 * UserDetailScreen — receives only a user id in its route and renders
 * whatever the view-model resolves for it.
 */

import { useUserDetail } from '@/hooks/useUserDetail'

export function UserDetailScreen() {
  const state = useUserDetail()

  return (
    <div className="screen">
      {state.status === 'loading' && (
        <div className="user-detail-loading" role="status">
          <div className="spinner" aria-hidden="true" />
          <span>Loading user data...</span>
        </div>
      )}

      {state.status === 'found' && (
        <div className="card">
          <h2>User Details</h2>
          <p>ID: {state.user.id}</p>
          <p>Name: {state.user.name}</p>
          <p>Email: {state.user.email}</p>
        </div>
      )}

      {state.status === 'not-found' && <div className="error">Error: User not found.</div>}
    </div>
  )
}
