import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { errorResponse, readJson } from '@/lib/http';

export const dynamic = 'force-dynamic';

const createSourceSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().url(),
  enabled: z.boolean().optional()
});

export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json(await store.listSources());
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: Request) {
  try {
    const input = createSourceSchema.parse(await readJson(request));
    const { store } = await getServices();
    const source = await store.createSource(input);
    return NextResponse.json(source);
  } catch (error) {
    return errorResponse(error);
  }
}
