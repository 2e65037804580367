import type { Metadata, Viewport } from 'next'
import Link from 'next/link'
import './globals.css'

export const metadata: Metadata = {
  title: 'Renovation Journey',
  description: 'Plan a home renovation one milestone at a time.',
}

export const viewport: Viewport = {
  themeColor: '#0f172a',
  width: 'device-width',
  initialScale: 1,
}

export default function RootLayout({
  children,
}: {
  children: React.ReactNode
}) {
  return (
    <html lang="en" className="dark">
      <body className="font-sans antialiased bg-slate-900 text-slate-100 min-h-screen">
        <header className="border-b border-slate-800">
          <nav className="max-w-5xl mx-auto flex items-center justify-between px-4 h-14">
            <Link href="/" className="font-semibold text-teal-400">
              Renovation Journey
            </Link>
            <div className="flex gap-4 text-sm text-slate-400">
              <Link href="/journey" className="hover:text-slate-100">
                Journey
              </Link>
              <Link href="/admin" className="hover:text-slate-100">
                Admin
              </Link>
            </div>
          </nav>
        </header>
        <main className="max-w-5xl mx-auto px-4 py-8">{children}</main>
      </body>
    </html>
  )
}
