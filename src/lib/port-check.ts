import net from "node:net"

/**
 * Check if something already accepts connections on host:port.
 * Wildcard bind addresses are probed through loopback.
 */
export async function isPortInUse(port: number, host = "127.0.0.1"): Promise<boolean> {
  const target = host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host

  return new Promise((resolve) => {
    const socket = new net.Socket()

    const onError = () => {
      socket.destroy()
      resolve(false) // nothing answered
    }

    const onConnect = () => {
      socket.destroy()
      resolve(true) // someone else owns the port
    }

    socket.setTimeout(1000)
    socket.once("error", onError)
    socket.once("timeout", onError)
    socket.connect(port, target, onConnect)
  })
}
