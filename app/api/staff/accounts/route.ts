import type { NextRequest } from 'next/server';
import { beginCycle } from '../../../../lib/cycle';
import { redirectWithOutcome, sessionFromRequest, storageErrorResponse } from '../../../../lib/responses';
import { createAccountAction } from '../../../../lib/staff-actions';

export async function POST(request: NextRequest) {
  try {
    const outcome = await createAccountAction(beginCycle(), await request.formData(), sessionFromRequest(request));
    return redirectWithOutcome(request, outcome);
  } catch (error) {
    return storageErrorResponse(error);
  }
}
