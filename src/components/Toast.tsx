import { useEffect, useState } from 'react';
import { useDocument } from '@/state/DocumentContext';

export default function Toast() {
  const toast = useDocument((s) => s.ui.toast);
  const dismissToast = useDocument((s) => s.dismissToast);
  const [visible, setVisible] = useState(false);

  useEffect(() => {
    if (toast && toast.until > Date.now()) {
      setVisible(true);
      const timer = setTimeout(() => {
        setVisible(false);
      }, toast.until - Date.now());
      return () => clearTimeout(timer);
    } else {
      setVisible(false);
    }
  }, [toast]);

  if (!visible || !toast) return null;

  return (
    <div className="toast toast-error" role="alert" data-testid="toast" onClick={dismissToast}>
      {toast.message}
    </div>
  );
}
