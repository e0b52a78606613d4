import { useNavigate } from 'react-router-dom'
import { createUserDetailRoute, userShortcuts } from '@/lib/routeConfig'

export function UserListScreen() {
  const navigate = useNavigate()

  return (
    <div className="screen">
      <h1>User List</h1>
      <div className="user-list">
        {userShortcuts.map((shortcut) => (
          <button
            key={shortcut.id}
            className="primary"
            onClick={() => navigate(createUserDetailRoute(shortcut.id))}
          >
            {shortcut.label}
          </button>
        ))}
      </div>
    </div>
  )
}
