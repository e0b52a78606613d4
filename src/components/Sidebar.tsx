/**
 * Sidebar — links to the start destination of each demo flow.
 */

import { NavLink } from 'react-router-dom'
import { flowLinks } from '@/lib/routeConfig'

export function Sidebar() {
  return (
    <aside className="sidebar">
      <div className="sidebar-brand">
        <div className="sidebar-mark">Nh</div>
        <span className="sidebar-title">Navigation Handoff</span>
      </div>
      <nav className="sidebar-nav">
        <div className="sidebar-section">
          <div className="sidebar-section-label">Demos</div>
          {flowLinks.map((link) => (
            <NavLink
              key={link.path}
              to={link.path}
              className={({ isActive }) =>
                `sidebar-link${isActive ? ' active' : ''}`
              }
            >
              {link.label}
            </NavLink>
          ))}
        </div>
      </nav>
    </aside>
  )
}
