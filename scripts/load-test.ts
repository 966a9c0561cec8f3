import WebSocket from 'ws'

const URL = process.env.WS_URL || 'ws://localhost:3001/ws/race'
const CLIENTS = Number(process.env.CLIENTS || 500)
const START_RACE = process.env.START_RACE === '1'

function connect(): Promise<WebSocket | null> {
  return new Promise((resolve) => {
    const ws = new WebSocket(URL)
    ws.once('open', () => resolve(ws))
    ws.once('error', (err) => {
      console.warn(`connect failed: ${err.message}`)
      resolve(null)
    })
  })
}

async function main(): Promise<void> {
  const sockets: WebSocket[] = []
  let frames = 0
  let closed = 0
  const start = Date.now()
  for (let i = 0; i < CLIENTS; i++) {
    const ws = await connect()
    if (!ws) continue
    ws.on('message', () => {
      frames++
    })
    ws.on('close', () => {
      closed++
    })
    sockets.push(ws)
    if (i % 50 === 0) console.log(`connected ${i}`)
  }
  const first = sockets[0]
  if (START_RACE && first) first.send(JSON.stringify({ action: 'start' }))

  setInterval(() => {
    const elapsed = (Date.now() - start) / 1000
    console.log(
      `clients=${sockets.filter((s) => s.readyState === WebSocket.OPEN).length} frames=${frames} closed=${closed} fps=${(frames / elapsed).toFixed(2)}`,
    )
  }, 5000)
}

main().catch((e: unknown) => {
  console.error(e)
  process.exit(1)
})
