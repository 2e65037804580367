import { format } from 'date-fns'
import { Card } from '@/components/ui/Card'
import { getJourneyRuntime } from '@/lib/journey/runtime'
import { DEFAULT_ALL_MESSAGES_LIMIT } from '@/lib/journey/store'

export const dynamic = 'force-dynamic'

function stamp(value: string) {
  return format(new Date(value), 'MMM d, HH:mm')
}

export default async function AdminPage() {
  const { store } = getJourneyRuntime()
  const [journeys, messages] = await Promise.all([
    store.listJourneys(),
    store.listMessages({ limit: DEFAULT_ALL_MESSAGES_LIMIT, order: 'desc' }),
  ])

  return (
    <div className="space-y-8">
      <h1 className="text-2xl font-semibold">Admin dashboard</h1>

      <Card title={`Journeys (${journeys.length})`}>
        <div className="overflow-x-auto">
          <table className="w-full text-sm">
            <thead className="text-left text-slate-400">
              <tr>
                <th className="py-2 pr-4">ID</th>
                <th className="py-2 pr-4">User</th>
                <th className="py-2 pr-4">Milestone</th>
                <th className="py-2 pr-4">Status</th>
                <th className="py-2 pr-4">Room</th>
                <th className="py-2 pr-4">Budget</th>
                <th className="py-2 pr-4">Style</th>
                <th className="py-2">Updated</th>
              </tr>
            </thead>
            <tbody>
              {journeys.map(journey => (
                <tr key={journey.id} className="border-t border-slate-700/50">
                  <td className="py-2 pr-4">{journey.id}</td>
                  <td className="py-2 pr-4">{journey.user_id}</td>
                  <td className="py-2 pr-4">{journey.current_milestone}</td>
                  <td className="py-2 pr-4">{journey.status}</td>
                  <td className="py-2 pr-4">{journey.room ?? '-'}</td>
                  <td className="py-2 pr-4">{journey.budget_range ?? '-'}</td>
                  <td className="py-2 pr-4">{journey.style_preference ?? '-'}</td>
                  <td className="py-2">{stamp(journey.updated_at)}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      </Card>

      <Card title="Recent messages">
        <ul className="space-y-3">
          {messages.map(message => (
            <li key={message.id} className="text-sm">
              <p className="text-slate-500">
                {stamp(message.timestamp)} · journey {message.journey_id} · milestone {message.current_milestone} ·{' '}
                {message.speaker}
              </p>
              <p className="text-slate-200 whitespace-pre-wrap">{message.content}</p>
            </li>
          ))}
        </ul>
      </Card>
    </div>
  )
}
