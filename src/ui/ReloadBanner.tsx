import { useEffect, useState } from 'react';

type ReloadBannerProps = {
  durationMs: number;
  resetKey: string;
};

export function ReloadBanner({ durationMs, resetKey }: ReloadBannerProps): JSX.Element | null {
  const [visible, setVisible] = useState(true);

  useEffect(() => {
    const timerId = window.setTimeout(() => {
      setVisible(false);
    }, durationMs);
    return () => {
      window.clearTimeout(timerId);
    };
  }, [durationMs]);

  if (!visible) {
    return null;
  }

  return (
    <div className="reload-banner" data-testid="reload-banner" role="status">
      Press <kbd>Ctrl</kbd>+<kbd>{resetKey.toUpperCase()}</kbd> to reset the points
    </div>
  );
}
