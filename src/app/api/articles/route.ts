import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { errorResponse } from '@/lib/http';
import { ARTICLE_STATUSES } from '@/types/models';

export const dynamic = 'force-dynamic';

const PAGE_SIZE = 20;

const listQuerySchema = z.object({
  status: z.enum(ARTICLE_STATUSES).optional(),
  page: z.coerce.number().int().min(1).default(1)
});

export async function GET(request: Request) {
  try {
    const params = new URL(request.url).searchParams;
    const { status, page } = listQuerySchema.parse({
      status: params.get('status') || undefined,
      page: params.get('page') || undefined
    });

    const { store } = await getServices();
    const [data, total] = await Promise.all([
      store.listArticles({ status, offset: (page - 1) * PAGE_SIZE, limit: PAGE_SIZE }),
      store.countArticles(status)
    ]);

    return NextResponse.json({ data, total, page });
  } catch (error) {
    return errorResponse(error);
  }
}
