import { QaWorkspace } from '@/components/qa/qa-workspace'

export default function HomePage() {
  return <QaWorkspace />
}
