import { NextResponse } from 'next/server';
import { buildPnlSurface } from '@/lib/actions/options.actions';
import { toErrorResponse } from '@/lib/api/responses';

export async function POST(req: Request) {
  try {
    const json: unknown = await req.json();
    const data = await buildPnlSurface(json);
    return NextResponse.json(data);
  } catch (error) {
    return toErrorResponse(error, 'PnL surface');
  }
}
