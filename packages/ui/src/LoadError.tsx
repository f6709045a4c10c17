export interface LoadErrorProps {
  condition: string;
  message: string;
}

export function LoadError({ condition, message }: LoadErrorProps) {
  return (
    <div role="alert" className="rounded-lg border border-red-200 bg-red-50 p-4 text-sm text-red-800">
      <p className="font-semibold">Could not load trials for “{condition}”.</p>
      <p className="mt-1">{message}</p>
    </div>
  );
}
