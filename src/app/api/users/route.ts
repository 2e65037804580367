import { NextRequest } from 'next/server'
import { toErrorResponse } from '@/lib/errors'
import { readJson } from '@/lib/http'
import { getJourneyRuntime } from '@/lib/journey/runtime'
import { userInputSchema } from './schema'

export async function GET() {
  try {
    const users = await getJourneyRuntime().store.listUsers()
    return Response.json(users)
  } catch (error) {
    return toErrorResponse(error, '[USERS] List')
  }
}

export async function POST(request: NextRequest) {
  try {
    const input = await readJson(request, userInputSchema)
    const user = await getJourneyRuntime().store.createUser(input)
    console.log(`[USERS] Created user ${user.id}`)
    return Response.json(user, { status: 201 })
  } catch (error) {
    return toErrorResponse(error, '[USERS] Create')
  }
}
