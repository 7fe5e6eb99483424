import { NextResponse } from 'next/server';
import { z } from 'zod';
import { InvalidParameterError, UnsupportedOptionKindError } from '@/lib/finance/errors';

export const toErrorResponse = (error: unknown, context: string) => {
  console.error(`${context} error:`, error);

  if (error instanceof z.ZodError) {
    return NextResponse.json(
      { error: 'Invalid payload', details: error.flatten() },
      { status: 400 }
    );
  }
  if (error instanceof InvalidParameterError) {
    return NextResponse.json(
      {
        error: 'Invalid payload',
        details: { formErrors: [], fieldErrors: { [error.field]: [error.message] } },
      },
      { status: 400 }
    );
  }
  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: 'Malformed JSON body' }, { status: 400 });
  }
  if (error instanceof UnsupportedOptionKindError) {
    return NextResponse.json({ error: 'Internal Server Error' }, { status: 500 });
  }
  return NextResponse.json(
    { error: error instanceof Error ? error.message : 'Internal Server Error' },
    { status: 500 }
  );
};
