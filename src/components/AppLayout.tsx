/**
 * AppLayout — shell layout with sidebar and content area.
 */

import { Outlet, useLocation } from 'react-router-dom'
import { Sidebar } from './Sidebar'

export function AppLayout() {
  const { key } = useLocation()

  return (
    <div className="app-layout">
      <Sidebar />
      <div className="app-main">
        <main className="app-content">
          {/* One screen instance per navigation entry */}
          <Outlet key={key} />
        </main>
      </div>
    </div>
  )
}
